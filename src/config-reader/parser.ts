import type {
  BlockMode,
  ConfigScan,
  ParseResult,
  ParserOptions,
  RuleRecord,
  SkippedRule,
} from './types.js';

export const DEFAULT_POLICY_SECTIONS: readonly string[] = ['firewall policy'];
export const DEFAULT_NAME_FIELD = 'name';

const LINE_BREAK = /\r\n|\r|\n/;

const CONFIG_PATTERN = /^config\s+(.+)$/i;
const EDIT_PATTERN = /^edit\s+(.+)$/i;
const NEXT_PATTERN = /^next$/i;
const END_PATTERN = /^end$/i;
const SET_PATTERN = /^set\s+(\S+)(?:\s+(.*))?$/i;
const LEADING_DIGITS_PATTERN = /^["']?(\d+)/;

interface OpenRule {
  rawId: string;
  lineNumber: number;
  name: string | null;
}

/**
 * Extract the ordered rule records from a configuration export.
 * Never throws. Only rules whose identifier has no usable number are dropped;
 * nameless and unterminated rules are kept.
 */
export function parseConfig(text: string, options: ParserOptions = {}): ParseResult {
  return scanConfig(text, options).rules;
}

/**
 * Walk the configuration text block by block.
 *
 * Markers are only interpreted inside a recognized policy block. Any other
 * block, and any `config ... end` sub-block nested in a policy block, is
 * skipped by tracking its config/end depth.
 */
export function scanConfig(text: string, options: ParserOptions = {}): ConfigScan {
  const sections = new Set((options.sections ?? DEFAULT_POLICY_SECTIONS).map(normalizeSection));
  const nameField = (options.nameField ?? DEFAULT_NAME_FIELD).toLowerCase();

  const lines = text === '' ? [] : text.split(LINE_BREAK);
  const rules: RuleRecord[] = [];
  const skipped: SkippedRule[] = [];
  let policyBlocks = 0;

  // State tracking
  let mode: BlockMode = 'top';
  let skipDepth = 0;
  let nestedDepth = 0;
  let current: OpenRule | null = null;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === '') continue;

    // --- Unrelated block: only follow its nesting ---
    if (mode === 'skipped') {
      skipDepth = trackDepth(line, skipDepth);
      if (skipDepth === 0) mode = 'top';
      continue;
    }

    // --- Top level: look for the next block ---
    if (mode === 'top') {
      const configMatch = line.match(CONFIG_PATTERN);
      if (!configMatch) continue;

      if (sections.has(normalizeSection(configMatch[1]))) {
        mode = 'policy';
        policyBlocks++;
      } else {
        mode = 'skipped';
        skipDepth = 1;
      }
      continue;
    }

    // --- Policy block ---
    if (nestedDepth > 0) {
      nestedDepth = trackDepth(line, nestedDepth);
      continue;
    }

    if (CONFIG_PATTERN.test(line)) {
      nestedDepth = 1;
      continue;
    }

    if (END_PATTERN.test(line)) {
      if (current) finalizeRule(current, rules, skipped);
      current = null;
      mode = 'top';
      continue;
    }

    if (NEXT_PATTERN.test(line)) {
      if (current) finalizeRule(current, rules, skipped);
      current = null;
      continue;
    }

    const editMatch = line.match(EDIT_PATTERN);
    if (editMatch) {
      // A missing `next` before this edit closes the previous rule
      if (current) finalizeRule(current, rules, skipped);
      current = { rawId: editMatch[1].trim(), lineNumber: i + 1, name: null };
      continue;
    }

    if (current && current.name === null) {
      current.name = matchNameAttribute(line, nameField);
    }
  }

  // Unterminated trailing rule
  if (current) finalizeRule(current, rules, skipped);

  return {
    rules: Object.freeze(rules),
    skipped: Object.freeze(skipped),
    policyBlocks,
    lineCount: lines.length,
  };
}

/**
 * Best-effort integer parse of an edit marker's identifier: the leading digit
 * run, after an optional opening quote. Returns null when there is none or it
 * is not a positive safe integer.
 */
export function parseRuleId(raw: string): number | null {
  const digitsMatch = raw.trim().match(LEADING_DIGITS_PATTERN);
  if (!digitsMatch) return null;

  const id = Number(digitsMatch[1]);
  if (!Number.isSafeInteger(id) || id <= 0) return null;
  return id;
}

/**
 * Remove one pair of matching enclosing quotes. Inner text is left untouched.
 */
export function stripQuotes(value: string): string {
  if (value.length < 2) return value;
  const first = value[0];
  if ((first === '"' || first === "'") && value[value.length - 1] === first) {
    return value.slice(1, -1);
  }
  return value;
}

function matchNameAttribute(line: string, nameField: string): string | null {
  const setMatch = line.match(SET_PATTERN);
  if (!setMatch || setMatch[1].toLowerCase() !== nameField) return null;
  return stripQuotes((setMatch[2] ?? '').trim());
}

function trackDepth(line: string, depth: number): number {
  if (CONFIG_PATTERN.test(line)) return depth + 1;
  if (END_PATTERN.test(line)) return depth - 1;
  return depth;
}

function finalizeRule(rule: OpenRule, rules: RuleRecord[], skipped: SkippedRule[]): void {
  const id = parseRuleId(rule.rawId);
  if (id === null) {
    skipped.push({ rawId: rule.rawId, lineNumber: rule.lineNumber });
    return;
  }
  rules.push({ id, name: rule.name ?? '' });
}

function normalizeSection(section: string): string {
  return section.trim().replace(/\s+/g, ' ').toLowerCase();
}
