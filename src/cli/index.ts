#!/usr/bin/env node
/**
 * @entry chain-doctor CLI
 *
 *   chain-doctor run            - one pass, print the report (exit 1 on critical)
 *   chain-doctor watch          - re-run on an interval, Enter runs now
 *   chain-doctor checks list    - known checks and their enable flags
 *   chain-doctor config show    - effective settings
 */

import { Command } from 'commander'
import { setLogLevel } from '../shared/logger.js'
import { printError } from '../shared/error.js'
import { registerRunCommand } from './commands/run.js'
import { registerWatchCommand } from './commands/watch.js'
import { registerChecksCommand } from './commands/checks.js'
import { registerConfigCommand } from './commands/config.js'

const program = new Command()

program
  .name('chain-doctor')
  .description('Find the broken link between this machine, the network, AI APIs and local clients')
  .version('0.1.0')
  .option('-v, --verbose', 'Show debug logs')
  .hook('preAction', thisCommand => {
    if (thisCommand.opts().verbose) setLogLevel('debug')
  })

registerRunCommand(program)
registerWatchCommand(program)
registerChecksCommand(program)
registerConfigCommand(program)

program.parseAsync().catch(e => {
  printError(e)
  process.exit(1)
})
