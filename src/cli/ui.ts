import logSymbols from 'log-symbols';
import { getPalette, Palette } from './theme.js';

export type Writer = (line: string) => void;

const moneyFmt = new Intl.NumberFormat('en-IN', { minimumFractionDigits: 2, maximumFractionDigits: 2 });

export function formatMoney(n: number): string {
  return moneyFmt.format(n);
}

export function formatRate(n: number): string {
  return `${n.toFixed(2)}%`;
}

/** Aligned `key  value` lines. */
export function keyValues(rows: Array<[string, string | number]>, palette: Palette = getPalette()): string[] {
  const width = Math.max(...rows.map(([k]) => k.length));
  return rows.map(([k, v]) => `${palette.dim(k.padEnd(width))}  ${v}`);
}

export function table(rows: Array<Record<string, string | number>>, palette: Palette = getPalette()): string[] {
  if (rows.length === 0) return ['(none)'];
  const headers = Object.keys(rows[0]);
  const widths = headers.map((h) => Math.max(h.length, ...rows.map((r) => String(r[h] ?? '').length)));
  const out = [headers.map((h, i) => palette.bold(h.padEnd(widths[i]))).join('  ').trimEnd()];
  for (const r of rows) {
    out.push(headers.map((h, i) => String(r[h] ?? '').padEnd(widths[i])).join('  ').trimEnd());
  }
  return out;
}

export function say(write: Writer, msg: string, style: 'info' | 'success' | 'warn' | 'error' | 'dim' = 'info', palette: Palette = getPalette()) {
  switch (style) {
    case 'success': write(`${logSymbols.success} ${palette.success(msg)}`); break;
    case 'warn': write(`${logSymbols.warning} ${palette.warn(msg)}`); break;
    case 'error': write(`${logSymbols.error} ${palette.error(msg)}`); break;
    case 'dim': write(palette.dim(msg)); break;
    default: write(`${logSymbols.info} ${palette.info(msg)}`); break;
  }
}
