import cron from 'node-cron'
import type { Logger } from '../../logger.js'

export interface CollectorHandle {
  stop(): void
}

/**
 * Run `job` on a cron schedule. A tick that fires while the previous run is
 * still going is skipped, so runs never overlap.
 */
export function startStreamerCollector(schedule: string, job: () => Promise<unknown>, logger: Logger): CollectorHandle {
  if (!cron.validate(schedule)) {
    throw new Error(`Invalid COLLECTION_SCHEDULE: ${schedule}`)
  }

  let running = false
  const task = cron.schedule(schedule, async () => {
    if (running) {
      logger.warn('[SCHEDULER] Previous collection still running; skipping this tick')
      return
    }
    running = true
    logger.info('[SCHEDULER] Running streamer collection...')
    try {
      const result = await job()
      logger.info({ result }, '[SCHEDULER] Collection complete')
    } catch (err) {
      logger.error({ err }, '[SCHEDULER] Collection failed')
    } finally {
      running = false
    }
  })

  logger.info({ schedule }, '[SCHEDULER] Streamer collection scheduled')

  return {
    stop() {
      logger.info('[SCHEDULER] Stopping streamer collection job')
      task.stop()
    },
  }
}
