// === Rule record ===

export interface RuleRecord {
  id: number;
  name: string;
}

/** Rules in source order. Never deduplicated. */
export type ParseResult = readonly RuleRecord[];

// === Skipped rules ===

export interface SkippedRule {
  rawId: string;
  lineNumber: number;
}

// === Scan ===

export interface ConfigScan {
  rules: ParseResult;
  skipped: readonly SkippedRule[];
  policyBlocks: number;
  lineCount: number;
}

export interface ParserOptions {
  sections?: readonly string[];
  nameField?: string;
}

export type BlockMode =
  | 'top'
  | 'policy'
  | 'skipped';

// === Reading ===

export type InputErrorReason =
  | 'not_found'
  | 'not_a_file'
  | 'unreadable';

export type ReadResult =
  | { success: true; path: string; content: string; sizeBytes: number }
  | { success: false; path: string; reason: InputErrorReason; error: string };
