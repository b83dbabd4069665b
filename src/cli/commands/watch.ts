import { Command } from 'commander'
import { createInterface } from 'readline'
import { formatRelative } from '../../shared/formatTime.js'
import { logError, createLogger, setLogMode } from '../../shared/logger.js'
import { ensureError } from '../../shared/assertError.js'
import { isRefreshInterval, REFRESH_INTERVAL_PRESETS } from '../../diagnostics/scheduler.js'
import { createCliContext } from '../context.js'
import { colorizeReport, error, info } from '../output.js'

const logger = createLogger('watch')

export function registerWatchCommand(program: Command) {
  program
    .command('watch')
    .description('Re-run the checks on an interval; Enter runs them now')
    .option('-i, --interval <preset>', `Refresh interval (${REFRESH_INTERVAL_PRESETS.join('/')})`)
    .action(async (options: { interval?: string }) => {
      if (options.interval && !isRefreshInterval(options.interval)) {
        error(`Unknown interval "${options.interval}" (expected ${REFRESH_INTERVAL_PRESETS.join('/')})`)
        process.exit(1)
      }

      const interval = options.interval && isRefreshInterval(options.interval) ? options.interval : undefined
      // Report redraws interleave with scheduler logs
      setLogMode('background')
      const { service, palette } = await createCliContext({ interval, runOnStart: true })

      service.onPass(pass => {
        const report = service.renderReport(pass, { includeErrorLog: true })
        if (process.stdout.isTTY) console.clear()
        console.log(colorizeReport(report ?? '', palette))
        console.log()
        const next = service.scheduler.nextRunAt()
        info(
          next
            ? `Next run ${formatRelative(next)} (${service.getRefreshInterval()}). Enter runs now, Ctrl+C quits.`
            : 'Auto-refresh off. Enter runs now, Ctrl+C quits.'
        )
      })

      const input = createInterface({ input: process.stdin })
      input.on('line', () => {
        service.runNow().catch(e => logError(logger, 'Manual run failed', ensureError(e)))
      })

      const shutdown = () => {
        input.close()
        service.stop()
        process.exit(0)
      }
      process.once('SIGINT', shutdown)
      process.once('SIGTERM', shutdown)

      service.start()
    })
}
