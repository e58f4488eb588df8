/**
 * Text formatting for command output.
 */

export type OutputFormat = 'default' | 'json' | 'pretty-json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['default', 'json', 'pretty-json'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Lays rows out in left aligned columns, two spaces apart, under a header
 * row and a dashed separator. Every line, including the last, ends in `\n`.
 */
export function buildTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((header, i) =>
    Math.max(header.length, ...rows.map((row) => row[i].length))
  );

  const separator = widths.map((width) => '-'.repeat(width));

  return [headers, separator, ...rows]
    .map((row) => row.map((field, i) => field.padEnd(widths[i])).join('  ') + '\n')
    .join('');
}

export function toJsonString(data: unknown, pretty: boolean): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}
