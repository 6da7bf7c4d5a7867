import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ReadRowsFile } from '../commands/write-table';

describe('ReadRowsFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sqlsteward-rows-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const filePath = path.join(dir, name);
    fs.writeFileSync(filePath, content, 'utf-8');
    return filePath;
  }

  it('reads an array of row objects', () => {
    const filePath = write('rows.json', JSON.stringify([{ ID: 1, Name: 'a' }, { ID: 2, Name: null }]));
    expect(ReadRowsFile(filePath)).toEqual([
      { ID: 1, Name: 'a' },
      { ID: 2, Name: null },
    ]);
  });

  it('reads an empty array', () => {
    expect(ReadRowsFile(write('empty.json', '[]'))).toEqual([]);
  });

  it('rejects a missing file', () => {
    const filePath = path.join(dir, 'missing.json');
    expect(() => ReadRowsFile(filePath)).toThrow(`Input file not found: ${filePath}`);
  });

  it('rejects a file that is not an array', () => {
    const filePath = write('object.json', '{"ID": 1}');
    expect(() => ReadRowsFile(filePath)).toThrow(`Input file ${filePath} must contain a JSON array of row objects`);
  });

  it('rejects an array element that is not an object', () => {
    const filePath = write('mixed.json', '[{"ID": 1}, 2]');
    expect(() => ReadRowsFile(filePath)).toThrow(`Row 2 of ${filePath} is not an object`);
  });
});
