import { Command } from 'commander'
import chalk from 'chalk'
import { table } from 'table'
import { printError } from '../../shared/error.js'
import type { CheckDefinition } from '../../diagnostics/types.js'
import { createCliContext } from '../context.js'
import { success } from '../output.js'

export function renderChecksTable(checks: readonly CheckDefinition[]): string {
  const data: string[][] = [['ID', 'Name', 'Category', 'Enabled']]
  for (const check of checks) {
    data.push([
      check.id,
      check.displayName,
      check.category,
      check.enabled ? chalk.green('yes') : chalk.gray('no'),
    ])
  }
  return table(data)
}

async function toggle(id: string, enabled: boolean): Promise<void> {
  const { service } = await createCliContext({ runOnStart: false })
  const result = await service.setCheckEnabled(id, enabled)
  if (!result.ok) {
    printError(result.error)
    process.exit(1)
  }
  success(`${result.value.displayName} ${enabled ? 'enabled' : 'disabled'}`)
}

export function registerChecksCommand(program: Command) {
  const checks = program.command('checks').description('List and toggle checks')

  checks
    .command('list')
    .description('Show every known check and whether it runs')
    .action(async () => {
      const { service } = await createCliContext({ runOnStart: false })
      console.log(renderChecksTable(service.listChecks()))
    })

  checks
    .command('enable <id>')
    .description('Enable a check')
    .action((id: string) => toggle(id, true))

  checks
    .command('disable <id>')
    .description('Disable a check')
    .action((id: string) => toggle(id, false))
}
