export const OUTPUT_FORMATS = ['detailed', 'simple', 'csv', 'json'] as const;

export type OutputFormat = typeof OUTPUT_FORMATS[number];

export interface JsonReport {
  version: 1;
  count: number;
  rules: { id: number; name: string }[];
}
