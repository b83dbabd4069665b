/**
 * Terminal colour themes for status output
 */

import chalk, { Chalk } from 'chalk'
import type { CheckStatus } from '../diagnostics/types.js'
import type { Theme } from '../config/schema.js'

type Paint = (text: string) => string

export interface Palette {
  status: Record<CheckStatus, Paint>
  accent: Paint
  dim: Paint
  bold: Paint
}

const plain = new Chalk({ level: 0 })

const PALETTES: Record<Theme, Palette> = {
  dark: {
    status: {
      ok: chalk.green,
      unknown: chalk.gray,
      warning: chalk.yellow,
      critical: chalk.red,
    },
    accent: chalk.cyan,
    dim: chalk.dim,
    bold: chalk.bold,
  },
  light: {
    status: {
      ok: chalk.green,
      unknown: chalk.blue,
      warning: chalk.magenta,
      critical: chalk.red.bold,
    },
    accent: chalk.blue,
    dim: chalk.gray,
    bold: chalk.bold,
  },
  plain: {
    status: {
      ok: plain.reset,
      unknown: plain.reset,
      warning: plain.reset,
      critical: plain.reset,
    },
    accent: plain.reset,
    dim: plain.reset,
    bold: plain.reset,
  },
}

export function getPalette(theme: Theme): Palette {
  return PALETTES[theme]
}
