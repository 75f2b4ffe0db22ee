import dotenv from 'dotenv'
import { z } from 'zod'

dotenv.config()

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((v) => v === 'true' || v === '1')

export const ConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  DATABASE_PATH: z.string().min(1).default('state/release-store.db'),
  DATABASE_LOGGING: booleanFlag,
  DATABASE_BUSY_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(5000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  MAIL_DOMAIN: z.string().min(1).default('example.org'),
})

export type Config = {
  nodeEnv: 'development' | 'production' | 'test'
  databasePath: string
  databaseLogging: boolean
  databaseBusyTimeoutMs: number
  logLevel: string
  mailDomain: string
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new Error(`Invalid configuration: ${issues}`)
  }
  const e = parsed.data
  return {
    nodeEnv: e.NODE_ENV,
    databasePath: e.DATABASE_PATH,
    databaseLogging: e.DATABASE_LOGGING,
    databaseBusyTimeoutMs: e.DATABASE_BUSY_TIMEOUT_MS,
    logLevel: e.LOG_LEVEL ?? (e.NODE_ENV === 'production' ? 'info' : e.NODE_ENV === 'test' ? 'silent' : 'debug'),
    mailDomain: e.MAIL_DOMAIN,
  }
}

export const config = loadConfig()
