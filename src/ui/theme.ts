import chalk from 'chalk';

export const brand = chalk.hex('#F59E0B');

export const color = {
  muted: chalk.hex('#A1A1AA'),
  faint: chalk.hex('#71717A'),
  ok: chalk.hex('#10B981'),
  fail: chalk.hex('#EF4444'),
  caution: chalk.hex('#F59E0B'),
  bold: chalk.bold,
} as const;

export const icon = {
  ok: '\u2713',
  fail: '\u2717',
  caution: '\u26A0',
  pipe: '\u2502',
} as const;
