import chalk from 'chalk';
import { isTestEnv } from '../util/env.js';

export type Palette = {
  info: (s: string) => string;
  success: (s: string) => string;
  warn: (s: string) => string;
  error: (s: string) => string;
  dim: (s: string) => string;
  bold: (s: string) => string;
};

export function isColorEnabled(argv: string[] = process.argv): boolean {
  if (isTestEnv()) return false;
  if (process.env.NO_COLOR || argv.includes('--no-color')) return false;
  return !!process.stdout.isTTY;
}

export function getPalette(color: boolean = isColorEnabled()): Palette {
  const c = new chalk.Instance({ level: color ? 3 : 0 });
  const theme = (process.env.CLI_THEME || 'neo').toLowerCase();
  if (theme === 'mono') {
    return { info: c.white, success: c.white, warn: c.white, error: c.white, dim: c.gray, bold: c.bold };
  }
  return { info: c.cyan, success: c.green, warn: c.yellow, error: c.red, dim: c.gray, bold: c.bold };
}
