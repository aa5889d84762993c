import { appendFileSync, writeFileSync } from 'node:fs';
import { EventEmitter } from '@pairwise/core';
import type { Serializable } from '../types';
import { csvLine } from './csv';

/** Turns rows into text chunks: one head, one body per row, one tail */
export type Stringifier = {
  head: (columns: readonly string[]) => string;
  body: (row: Serializable, index: number, columns: readonly string[]) => string;
  tail: () => string;
};

const stringifiers = {
  /** @see {@link https://www.rfc-editor.org/rfc/rfc4180 | RFC-4180} */
  csv: {
    head: (columns) => csvLine(columns),
    body: (row, _, columns) => csvLine(columns.map((key) => row[key])),
    tail: () => '',
  },
  /** @see {@link https://www.json.org | JSON} */
  json: {
    head: () => '[',
    body: (row, index) => (index ? ',' : '') + JSON.stringify(row),
    tail: () => ']',
  },
} satisfies Record<string, Stringifier>;
export type DataFormat = keyof typeof stringifiers;

/**
 * One-time data collector. Collect rows, stringify them chunk by chunk and
 * emit every chunk as soon as it exists.
 *
 * Nothing is buffered: a listener of `chunk` that writes synchronously (see
 * {@link appendToFile}) has every row on disk when {@link Collector.add}
 * returns, and its errors are thrown from `add`.
 *
 * @example
 *
 * ```ts
 * const dc = new Collector('data.csv', ['name', 'age']).on('chunk', (chunk) =>
 *   process.stdout.write(chunk),
 * );
 * dc.open(); // name,age
 * dc.add({ name: 'Alice', age: 25 }); // Alice,25
 * dc.save();
 * ```
 */
export class Collector<T extends Serializable> extends EventEmitter<{
  add: T;
  chunk: string;
  save: null;
}> {
  /**
   * Stringifiers by file extension
   *
   * @example Add a tab separated stringifier
   *
   * ```ts
   * Collector.stringifiers['tsv'] = {
   *   head: (columns) => columns.join('\t') + '\n',
   *   body: (row, _, columns) => columns.map((c) => row[c]).join('\t') + '\n',
   *   tail: () => '',
   * };
   * ```
   */
  static readonly stringifiers: typeof stringifiers &
    Record<string, Stringifier> = stringifiers;
  readonly rows: T[] = [];
  /** Everything emitted so far */
  value = '';
  readonly stringifier: Stringifier;
  #opened = false;
  #save_count = 0;
  /**
   * @param filename Its extension selects the stringifier, `csv` when unknown
   * @param columns Column order of CSV output
   */
  constructor(
    public readonly filename: string,
    public readonly columns: readonly (keyof T & string)[],
    stringifier?: Stringifier,
  ) {
    super();

    const extname = filename.match(/\.([^.]+)$/)?.[1];
    if (stringifier) {
      this.stringifier = stringifier;
    } else if (extname && Object.hasOwn(Collector.stringifiers, extname)) {
      this.stringifier = Collector.stringifiers[extname];
    } else {
      console.warn(
        `Expect file extension: ${Object.keys(Collector.stringifiers).join(
          ', ',
        )}, but got "${extname ?? filename}". Falling back to csv.`,
      );
      this.stringifier = Collector.stringifiers.csv;
    }

    // save data on dispose
    this.on('dispose', () => this.save());
  }
  #emit(chunk: string) {
    if (!chunk) return;
    this.value += chunk;
    this.emit('chunk', chunk);
  }
  /** Emit the head chunk, once */
  open() {
    if (!this.#opened) {
      this.#opened = true;
      this.#emit(this.stringifier.head(this.columns));
    }
    return this;
  }
  /** Add a data row of primitive values */
  add(row: T) {
    this.open();
    this.rows.push(row);
    this.emit('add', row);
    this.#emit(this.stringifier.body(row, this.rows.length - 1, this.columns));
    return this;
  }
  /**
   * Emit the tail chunk
   *
   * It is one-time, so later calls are ignored with a warning.
   */
  save() {
    if (this.#save_count++) {
      console.warn('Repeated save is not allowed.', this.#save_count);
      return this;
    }
    this.open();
    this.#emit(this.stringifier.tail());
    return this.emit('save', null);
  }
}

/**
 * Truncate `filepath`, then append every chunk of the collector to it
 * synchronously
 */
export const appendToFile = <T extends Serializable>(
  collector: Collector<T>,
  filepath: string,
) => {
  writeFileSync(filepath, '');
  return collector.on('chunk', (chunk) => appendFileSync(filepath, chunk));
};
