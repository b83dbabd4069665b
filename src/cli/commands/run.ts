import { Command } from 'commander'
import { parseDuration } from '../../shared/formatTime.js'
import { printError } from '../../shared/error.js'
import { STATUS_LABELS } from '../../diagnostics/status.js'
import { createCliContext } from '../context.js'
import { withSpinner } from '../spinner.js'
import { colorizeReport, error, success, warn } from '../output.js'

interface RunOptions {
  json?: boolean
  copy?: boolean
  log?: boolean
  only?: string[]
  timeout?: string
}

export function registerRunCommand(program: Command) {
  program
    .command('run')
    .description('Run every enabled check once and print the report')
    .option('--json', 'Print the pass as JSON')
    .option('--copy', 'Copy the report to the clipboard')
    .option('--log', 'Append the error log section')
    .option('--only <ids...>', 'Run only these checks')
    .option('--timeout <duration>', 'Per-check timeout, e.g. 3s')
    .action(async (options: RunOptions) => {
      const { service, palette } = await createCliContext({ runOnStart: false })

      if (options.only) {
        const applied = service.registry.applyEnabledSet(options.only)
        if (!applied.ok) {
          printError(applied.error)
          process.exit(1)
        }
      }

      if (options.timeout) {
        try {
          service.orchestrator.configure({ probeTimeoutMs: parseDuration(options.timeout) })
        } catch (e) {
          printError(e)
          process.exit(1)
        }
      }

      const count = service.registry.listEnabled().length
      const outcome = await withSpinner(`Running ${count} check(s)...`, () => service.runNow(), {
        silent: options.json,
        successText: result =>
          result.kind === 'published'
            ? `Overall: ${STATUS_LABELS[result.pass.overallStatus]}`
            : `Pass ${result.passId} ${result.reason}`,
      })

      if (outcome.kind === 'discarded') {
        error(`Pass ${outcome.passId} was ${outcome.reason} before it finished`)
        process.exit(1)
      }

      const { pass } = outcome
      if (options.json) {
        console.log(JSON.stringify(pass, null, 2))
      } else {
        const report = service.renderReport(pass, { includeErrorLog: options.log })
        console.log()
        console.log(colorizeReport(report ?? '', palette))
      }

      if (options.copy) {
        const copied = await service.copyReport()
        if (copied.ok) success('Report copied to clipboard')
        else warn(copied.error.message)
      }

      process.exitCode = pass.overallStatus === 'critical' ? 1 : 0
    })
}
