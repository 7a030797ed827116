import type { ParseResult } from '../config-reader/types.js';
import { OUTPUT_FORMATS, type JsonReport, type OutputFormat } from './types.js';

const CSV_NEEDS_QUOTING = /[",\r\n]/;

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Render rules in the requested format. Non-empty output always ends with a
 * newline.
 */
export function renderRules(rules: ParseResult, format: OutputFormat): string {
  switch (format) {
    case 'detailed':
      return toText(renderDetailed(rules));
    case 'simple':
      return toText(rules.map((rule) => rule.name));
    case 'csv':
      return toText(renderCsv(rules));
    case 'json':
      return JSON.stringify(buildJsonReport(rules), null, 2) + '\n';
  }
}

function renderDetailed(rules: ParseResult): string[] {
  const lines = [`Found ${rules.length} firewall rule(s):`];
  if (rules.length === 0) return lines;

  lines.push('');
  for (const rule of rules) {
    lines.push(`  ID: ${String(rule.id).padStart(6)}  |  Name: ${rule.name}`);
  }
  return lines;
}

function renderCsv(rules: ParseResult): string[] {
  const lines = ['id,name'];
  for (const rule of rules) {
    lines.push(`${rule.id},${escapeCsvField(rule.name)}`);
  }
  return lines;
}

export function buildJsonReport(rules: ParseResult): JsonReport {
  return {
    version: 1,
    count: rules.length,
    rules: rules.map((rule) => ({ id: rule.id, name: rule.name })),
  };
}

/**
 * Quote a CSV field only when it holds a comma, quote or line break.
 */
export function escapeCsvField(value: string): string {
  if (CSV_NEEDS_QUOTING.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function toText(lines: string[]): string {
  return lines.length === 0 ? '' : lines.join('\n') + '\n';
}
