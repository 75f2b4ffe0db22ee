import pino from 'pino'
import { config } from './config.js'

export const logger = pino({ level: config.logLevel })

export function moduleLogger(module: string) {
  return logger.child({ module })
}
