import dotenv from 'dotenv'
import { collectWithConfig, resolveConfig } from './app.js'
import { createLogger } from './logger.js'
import { startStreamerCollector } from './services/scheduler/streamer-collector.js'

dotenv.config()
const logger = createLogger(process.env.LOG_LEVEL)

async function main() {
  const config = resolveConfig(process.env, logger)
  if (!config) {
    process.exitCode = 1
    return
  }

  if (!config.schedule) {
    await collectWithConfig(config, { logger })
    return
  }

  const collector = startStreamerCollector(config.schedule, () => collectWithConfig(config, { logger }), logger)
  const shutdown = () => {
    collector.stop()
    logger.flush()
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)
}

main().catch((e) => {
  logger.error(e, 'Fatal error')
  logger.flush()
  process.exit(1)
})
