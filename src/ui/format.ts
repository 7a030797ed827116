import { color, icon } from './theme.js';

export function success(text: string): string {
  return color.ok(`${icon.ok} ${text}`);
}

export function error(text: string): string {
  return color.fail(`${icon.fail} ${text}`);
}

export function warn(text: string): string {
  return color.caution(`${icon.caution} ${text}`);
}

export function muted(text: string): string {
  return color.muted(text);
}

/**
 * Indented detail line under a message: "  │  text".
 */
export function detail(text: string): string {
  return `  ${color.faint(icon.pipe)}  ${color.faint(text)}`;
}
