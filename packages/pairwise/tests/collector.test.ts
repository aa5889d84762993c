import { readFileSync } from 'node:fs';
import path from 'node:path';
import { describe, expect, it, vi } from 'vitest';
import { appendToFile, Collector } from '../src/collector';
import { useTempDir } from './helpers';

type Row = { name: string; age: number | null };

const collect = (filename: string) => {
  const chunks: string[] = [];
  const collector = new Collector<Row>(filename, ['name', 'age']).on(
    'chunk',
    (chunk) => chunks.push(chunk),
  );
  return { collector, chunks };
};

describe('Collector', () => {
  it('should emit CSV chunks as rows arrive', () => {
    const { collector, chunks } = collect('data.csv');
    collector.open();
    expect(chunks).toEqual(['name,age\n']);
    collector.add({ name: 'Alice', age: 25 });
    collector.add({ name: 'Doe, J', age: null });
    collector.save();
    expect(chunks).toEqual(['name,age\n', 'Alice,25\n', '"Doe, J",\n']);
    expect(collector.value).toBe('name,age\nAlice,25\n"Doe, J",\n');
  });

  it('should open on the first row', () => {
    const { collector, chunks } = collect('data.csv');
    collector.add({ name: 'Alice', age: 25 });
    expect(chunks).toEqual(['name,age\n', 'Alice,25\n']);
  });

  it('should write a JSON array in json files', () => {
    const { collector } = collect('data.json');
    collector.add({ name: 'Alice', age: 25 }).add({ name: 'Bob', age: null });
    expect(collector.value).toBe('[{"name":"Alice","age":25},{"name":"Bob","age":null}');
    collector.save();
    expect(JSON.parse(collector.value)).toEqual([
      { name: 'Alice', age: 25 },
      { name: 'Bob', age: null },
    ]);
  });

  it('should fall back to CSV for unknown extensions', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { collector } = collect('data.txt');
    expect(collector.stringifier).toBe(Collector.stringifiers.csv);
    expect(warn).toHaveBeenCalledWith(
      'Expect file extension: csv, json, but got "txt". Falling back to csv.',
    );
  });

  it('should keep the rows', () => {
    const { collector } = collect('data.csv');
    collector.add({ name: 'Alice', age: 25 });
    expect(collector.rows).toEqual([{ name: 'Alice', age: 25 }]);
  });

  it('should emit add with the row', () => {
    const { collector } = collect('data.csv');
    const onAdd = vi.fn();
    collector.on('add', onAdd);
    collector.add({ name: 'Alice', age: 25 });
    expect(onAdd).toHaveBeenCalledWith({ name: 'Alice', age: 25 });
  });

  it('should save only once', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { collector } = collect('data.json');
    const onSave = vi.fn();
    collector.on('save', onSave);
    collector.save();
    collector.save();
    expect(onSave).toHaveBeenCalledTimes(1);
    expect(collector.value).toBe('[]');
    expect(warn).toHaveBeenCalledWith('Repeated save is not allowed.', 2);
  });

  it('should save on dispose', () => {
    const { collector } = collect('data.csv');
    const onSave = vi.fn();
    collector.on('save', onSave);
    collector.emit('dispose', null);
    expect(onSave).toHaveBeenCalledTimes(1);
  });
});

describe('appendToFile', () => {
  const tempDir = useTempDir();

  it('should have every row on disk when add returns', () => {
    const filepath = path.join(tempDir(), 'data.csv');
    const collector = appendToFile(
      new Collector<Row>(filepath, ['name', 'age']),
      filepath,
    );
    expect(readFileSync(filepath, 'utf-8')).toBe('');
    collector.add({ name: 'Alice', age: 25 });
    expect(readFileSync(filepath, 'utf-8')).toBe('name,age\nAlice,25\n');
  });

  it('should throw write errors from add', () => {
    const dir = tempDir();
    const filepath = path.join(dir, 'data.csv');
    const collector = appendToFile(
      new Collector<Row>(filepath, ['name', 'age']),
      filepath,
    );
    collector.on('chunk', () => {
      throw new Error('disk full');
    });
    expect(() => collector.add({ name: 'Alice', age: 25 })).toThrow('disk full');
  });
});
