import { pino, type Logger } from 'pino'

export type { Logger }

export function createLogger(level?: string): Logger {
  return pino({
    name: 'streamer-collector',
    level: level || (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
  })
}
