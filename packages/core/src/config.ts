import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { z } from 'zod'
import { DEFAULT_COMMAND_KEYWORDS } from './parser/commands.js'
import { DEFAULT_PARSER_OPTIONS } from './parser/stop-name-parser.js'
import { DEFAULT_TIME_ZONE } from './realtime/timetable.js'

const CONFIG_FILENAME = 'noriba.yaml'

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

const ConfigSchema = z.object({
  server: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: z.number().int().min(0).max(65535).default(8000),
      basePath: z
        .string()
        .regex(/^(\/[\w-]+)*$/, 'must be empty or look like /segment[/segment]')
        .default('/noriba'),
    })
    .default({}),
  line: z
    .object({
      channelAccessToken: z.string().min(1).optional(),
      channelSecret: z.string().min(1).optional(),
    })
    .default({}),
  busApi: z
    .object({
      baseUrl: z.string().url().default('http://localhost:8081/kcb_api'),
      apiKey: z.string().optional(),
      timeoutMs: z.number().int().positive().default(10_000),
      /** Check a lone departure stop exists before asking for the destination */
      validateStops: z.boolean().default(true),
    })
    .default({}),
  session: z
    .object({
      ttlMinutes: z.number().positive().default(10),
    })
    .default({}),
  parser: z
    .object({
      delimiters: z.array(z.string().min(1)).default(DEFAULT_PARSER_OPTIONS.delimiters),
      destinationSuffixes: z.array(z.string().min(1)).default(DEFAULT_PARSER_OPTIONS.destinationSuffixes),
      minStopNameLength: z.number().int().min(1).default(DEFAULT_PARSER_OPTIONS.minStopNameLength),
    })
    .default({}),
  commands: z
    .object({
      help: z.array(z.string().min(1)).default(DEFAULT_COMMAND_KEYWORDS.help),
      cancel: z.array(z.string().min(1)).default(DEFAULT_COMMAND_KEYWORDS.cancel),
      nearby: z.array(z.string().min(1)).default(DEFAULT_COMMAND_KEYWORDS.nearby),
    })
    .default({}),
  realtime: z
    .object({
      timeZone: z.string().default(DEFAULT_TIME_ZONE),
    })
    .default({}),
  search: z
    .object({
      routeLimit: z.number().int().min(1).max(10).default(3),
      nearbyRadiusMeters: z.number().int().min(1).max(5000).default(500),
      nearbyLimit: z.number().int().min(1).max(12).default(5),
    })
    .default({}),
  dedup: z
    .object({
      ttlMinutes: z.number().positive().default(20),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default('info'),
      pretty: z.boolean().default(false),
    })
    .default({}),
})

export type NoribaConfig = z.infer<typeof ConfigSchema>

export interface LineCredentials {
  channelAccessToken: string
  channelSecret: string
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export interface LoadConfigOptions {
  /** Explicit YAML path; otherwise NORIBA_CONFIG, then ./noriba.yaml if present */
  configPath?: string
  env?: NodeJS.ProcessEnv
  cwd?: string
}

type RawConfig = Record<string, unknown>

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function resolveConfigPath(options: LoadConfigOptions, env: NodeJS.ProcessEnv): string | null {
  const explicit = options.configPath ?? env.NORIBA_CONFIG
  if (explicit) {
    const resolved = path.resolve(options.cwd ?? process.cwd(), explicit)
    if (!existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`)
    }
    return resolved
  }

  const fallback = path.join(options.cwd ?? process.cwd(), CONFIG_FILENAME)
  return existsSync(fallback) ? fallback : null
}

function loadYamlConfig(configPath: string): RawConfig {
  let parsed: unknown
  try {
    parsed = parse(readFileSync(configPath, 'utf-8'))
  } catch (err) {
    throw new ConfigError(
      `Could not parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
    )
  }
  if (parsed === null || parsed === undefined) return {}
  if (!isRecord(parsed)) {
    throw new ConfigError(`${configPath} must contain a YAML mapping`)
  }
  // A section holding only comments parses as null; treat it as absent
  return Object.fromEntries(Object.entries(parsed).filter(([, value]) => value !== null))
}

function setIn(raw: RawConfig, section: string, key: string, value: unknown): void {
  const current = raw[section]
  raw[section] = { ...(isRecord(current) ? current : {}), [key]: value }
}

function toNumber(value: string): number {
  // NaN fails schema validation with a readable message
  return value.trim() === '' ? Number.NaN : Number(value)
}

/** Environment variables win over the YAML file */
function applyEnvOverrides(yaml: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
  const raw: RawConfig = { ...yaml }

  if (env.HOST) setIn(raw, 'server', 'host', env.HOST)
  if (env.PORT) setIn(raw, 'server', 'port', toNumber(env.PORT))
  if (env.BASE_PATH !== undefined) setIn(raw, 'server', 'basePath', env.BASE_PATH)

  if (env.LINE_CHANNEL_ACCESS_TOKEN) {
    setIn(raw, 'line', 'channelAccessToken', env.LINE_CHANNEL_ACCESS_TOKEN)
  }
  if (env.LINE_CHANNEL_SECRET) setIn(raw, 'line', 'channelSecret', env.LINE_CHANNEL_SECRET)

  if (env.BUS_API_BASE_URL) setIn(raw, 'busApi', 'baseUrl', env.BUS_API_BASE_URL)
  if (env.BUS_API_KEY) setIn(raw, 'busApi', 'apiKey', env.BUS_API_KEY)

  if (env.SESSION_TTL_MINUTES) {
    setIn(raw, 'session', 'ttlMinutes', toNumber(env.SESSION_TTL_MINUTES))
  }
  if (env.TZ_NAME) setIn(raw, 'realtime', 'timeZone', env.TZ_NAME)

  if (env.LOG_LEVEL) setIn(raw, 'logging', 'level', env.LOG_LEVEL)
  if (env.LOG_PRETTY) setIn(raw, 'logging', 'pretty', env.LOG_PRETTY === 'true')

  return raw
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ')
}

export function loadConfig(options: LoadConfigOptions = {}): NoribaConfig {
  const env = options.env ?? process.env
  const configPath = resolveConfigPath(options, env)
  const yaml = configPath ? loadYamlConfig(configPath) : {}

  const result = ConfigSchema.safeParse(applyEnvOverrides(yaml, env))
  if (!result.success) {
    const where = configPath ? ` (${configPath})` : ''
    throw new ConfigError(`Invalid configuration${where}: ${formatIssues(result.error)}`)
  }
  return result.data
}

/** The server cannot start without both LINE credentials */
export function requireLineCredentials(config: NoribaConfig): LineCredentials {
  const { channelAccessToken, channelSecret } = config.line
  if (!channelAccessToken || !channelSecret) {
    throw new ConfigError(
      'LINE_CHANNEL_ACCESS_TOKEN and LINE_CHANNEL_SECRET must be set (environment or line.* in the config file)',
    )
  }
  return { channelAccessToken, channelSecret }
}

export function sessionTtlMs(config: NoribaConfig): number {
  return Math.round(config.session.ttlMinutes * 60 * 1000)
}
