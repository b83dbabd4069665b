/**
 * Clipboard sink: first available platform tool wins
 */

import { execa } from 'execa'
import { AppError } from '../shared/error.js'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'

const logger = createLogger('clipboard')

export type ClipboardWriter = (text: string) => Promise<void>

interface ClipboardCommand {
  command: string
  args: string[]
}

export function clipboardCommands(platform: NodeJS.Platform = process.platform): ClipboardCommand[] {
  switch (platform) {
    case 'darwin':
      return [{ command: 'pbcopy', args: [] }]
    case 'win32':
      return [{ command: 'clip', args: [] }]
    default:
      return [
        { command: 'wl-copy', args: [] },
        { command: 'xclip', args: ['-selection', 'clipboard'] },
        { command: 'xsel', args: ['--clipboard', '--input'] },
      ]
  }
}

export const writeClipboard: ClipboardWriter = async text => {
  const failures: string[] = []
  for (const { command, args } of clipboardCommands()) {
    try {
      await execa(command, args, { input: text })
      logger.debug(`Copied ${text.length} chars via ${command}`)
      return
    } catch (error) {
      failures.push(`${command}: ${getErrorMessage(error)}`)
    }
  }
  throw AppError.clipboardUnavailable(`No clipboard tool worked (${failures.join('; ')})`)
}
