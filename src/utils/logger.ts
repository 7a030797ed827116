import type { ConfigScan, SkippedRule } from '../config-reader/types.js';
import { color } from '../ui/theme.js';
import { success, error, warn, muted, detail } from '../ui/format.js';

// Diagnostics go to stderr; stdout carries only rendered rules.

export function printHeader(inputPath: string, format: string): void {
  printVerbose(`Extracting rules from ${inputPath} (format: ${format})`);
}

export function printWarning(message: string): void {
  console.error(warn(message));
}

export function printError(message: string): void {
  console.error(error(message));
}

export function printVerbose(message: string): void {
  console.error(detail(message));
}

// === Parse output ===

export function printScanSummary(scan: ConfigScan, sizeBytes: number): void {
  printVerbose(`Read ${scan.lineCount} lines (${sizeBytes}B)`);
  printVerbose(
    `${scan.policyBlocks} policy block${scan.policyBlocks === 1 ? '' : 's'}, ` +
    `${scan.rules.length} rule${scan.rules.length === 1 ? '' : 's'}, ` +
    `${scan.skipped.length} skipped`,
  );
}

export function printSkippedRules(skipped: readonly SkippedRule[]): void {
  if (skipped.length === 0) return;
  printWarning(
    `Skipped ${skipped.length} rule${skipped.length === 1 ? '' : 's'} with a malformed identifier`,
  );
  for (const rule of skipped) {
    printVerbose(`line ${rule.lineNumber}: edit ${rule.rawId}`);
  }
}

export function printStrictFailure(skipped: readonly SkippedRule[]): void {
  printError(
    `${skipped.length} rule${skipped.length === 1 ? '' : 's'} with a malformed identifier (--strict)`,
  );
  for (const rule of skipped) {
    console.error(detail(`line ${color.bold(String(rule.lineNumber))}: edit ${rule.rawId}`));
  }
}

export function printNoRulesFound(): void {
  printWarning('No firewall rules found in the configuration file.');
}

export function printOutputWritten(path: string): void {
  console.error(success(`Output written to: ${path}`));
}

export function printHint(message: string): void {
  console.error(muted(message));
}
