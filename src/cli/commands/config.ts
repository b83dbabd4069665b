import { Command } from 'commander'
import YAML from 'yaml'
import {
  loadConfig,
  saveConfig,
  findConfigPaths,
  resolveWritePath,
  REFRESH_INTERVAL_VALUES,
  THEME_VALUES,
} from '../../config/index.js'
import { printError } from '../../shared/error.js'
import { blank, error, header, list, success } from '../output.js'

export function registerConfigCommand(program: Command) {
  const config = program.command('config').description('Show or change settings')

  config
    .command('show')
    .description('Print the effective settings')
    .action(async () => {
      const { globalPath, projectPath } = findConfigPaths()
      header('Settings')
      list([
        { label: 'Global', value: globalPath ?? '(none)', dim: !globalPath },
        { label: 'Project', value: projectPath ?? '(none)', dim: !projectPath },
        { label: 'Writes to', value: resolveWritePath() },
      ])
      blank()
      console.log(YAML.stringify(await loadConfig()))
    })

  config
    .command('interval <preset>')
    .description(`Set the refresh interval (${REFRESH_INTERVAL_VALUES.join('/')})`)
    .action(async (preset: string) => {
      const value = REFRESH_INTERVAL_VALUES.find(v => v === preset)
      if (!value) {
        error(`Unknown interval "${preset}" (expected ${REFRESH_INTERVAL_VALUES.join('/')})`)
        process.exit(1)
      }
      try {
        const path = await saveConfig({ refresh_interval: value })
        success(`Refresh interval set to ${value} (${path})`)
      } catch (e) {
        printError(e)
        process.exit(1)
      }
    })

  config
    .command('theme <theme>')
    .description(`Set the colour theme (${THEME_VALUES.join('/')})`)
    .action(async (theme: string) => {
      const value = THEME_VALUES.find(v => v === theme)
      if (!value) {
        error(`Unknown theme "${theme}" (expected ${THEME_VALUES.join('/')})`)
        process.exit(1)
      }
      try {
        const path = await saveConfig({ theme: value })
        success(`Theme set to ${value} (${path})`)
      } catch (e) {
        printError(e)
        process.exit(1)
      }
    })
}
