import type { Primitive } from '../types';

/** @see {@link https://www.rfc-editor.org/rfc/rfc4180 | RFC-4180} */
export const normalize = (value: Primitive) =>
  value == null
    ? ''
    : ((value = '' + value),
      /[,"\n\r]/.test(value) ? `"${value.replaceAll('"', '""')}"` : value);

/** One CSV line, ending with a line feed */
export const csvLine = (values: readonly Primitive[]) =>
  values.map(normalize).join(',') + '\n';

/**
 * Parse CSV text into rows of fields
 *
 * Quoted fields may contain commas, quotes (doubled) and line breaks. Both
 * `\n` and `\r\n` end a record; a trailing line break does not add an empty
 * record.
 */
export function parseCsv(text: string) {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;
  let i = 0;

  const endField = () => (row.push(field), (field = ''));
  const endRow = () => (endField(), rows.push(row), (row = []));

  while (i < text.length) {
    const char = text[i];
    if (quoted) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        field += char;
      }
      i++;
      continue;
    }
    switch (char) {
      case '"':
        if (field !== '') {
          throw new Error(`Unexpected quote inside an unquoted field at ${i}`);
        }
        quoted = true;
        break;
      case ',':
        endField();
        break;
      case '\r':
        if (text[i + 1] === '\n') i++;
        endRow();
        break;
      case '\n':
        endRow();
        break;
      default:
        field += char;
    }
    i++;
  }
  if (quoted) throw new Error('Unterminated quoted field');
  if (field !== '' || row.length) endRow();
  return rows;
}

/**
 * Parse CSV text whose first record is a header into objects keyed by column
 *
 * @example
 *
 * ```ts
 * parseCsvRecords('a,b\n1,2\n'); // [{ a: '1', b: '2' }]
 * ```
 */
export const parseCsvRecords = (text: string) => {
  const [header, ...rows] = parseCsv(text);
  if (!header) return [];
  return rows.map((fields, n) => {
    if (fields.length !== header.length) {
      throw new Error(
        `Record ${n + 1} has ${fields.length} fields, expected ${header.length}`,
      );
    }
    return Object.fromEntries(
      header.map((key, i): [string, string] => [key, fields[i] ?? '']),
    );
  });
};
