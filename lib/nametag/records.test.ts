import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { InputParseError } from '../errors';
import { parseParamValue, parseRecords, readRecords } from './records';
import { DEFAULT_PARAMS } from './types';

describe('parseParamValue', () => {
  it('accepts decimal numbers', () => {
    expect(parseParamValue('12')).toBe(12);
    expect(parseParamValue(' -2.5 ')).toBe(-2.5);
    expect(parseParamValue('.5')).toBe(0.5);
    expect(parseParamValue('3.')).toBe(3);
    expect(parseParamValue('1e3')).toBe(1000);
  });

  it('rejects everything else', () => {
    expect(parseParamValue('abc')).toBeNull();
    expect(parseParamValue('')).toBeNull();
    expect(parseParamValue('   ')).toBeNull();
    expect(parseParamValue('0x10')).toBeNull();
    expect(parseParamValue('Infinity')).toBeNull();
    expect(parseParamValue('NaN')).toBeNull();
    expect(parseParamValue('12mm')).toBeNull();
    expect(parseParamValue(undefined)).toBeNull();
  });
});

describe('parseRecords', () => {
  it('skips rows without a usable name and keeps bad values at their defaults', () => {
    const csv = ['name,text_size', 'Jane Doe,', ',12', 'Bob,abc', ''].join('\n');
    const records = parseRecords(csv);

    expect(records).toEqual([
      { name: 'Jane Doe', params: DEFAULT_PARAMS, overrides: [] },
      { name: 'Bob', params: DEFAULT_PARAMS, overrides: [] },
    ]);
    expect(records[1].params.text_size).toBe(8);
  });

  it('drops whitespace-only names and blank lines', () => {
    const records = parseRecords('name\nJane Doe\n\n   \nBob\n');
    expect(records.map((r) => r.name)).toEqual(['Jane Doe', 'Bob']);
  });

  it('trims names', () => {
    expect(parseRecords('name\n  Amy  \n')[0].name).toBe('Amy');
  });

  it('overrides only the numeric columns that are present', () => {
    const csv = 'name,nametag_width,ring_height,colour\nAmy, 95 ,0.8,red\n';
    const [amy] = parseRecords(csv);
    expect(amy.params).toEqual({ ...DEFAULT_PARAMS, nametag_width: 95, ring_height: 0.8 });
    expect(amy.overrides).toEqual(['nametag_width', 'ring_height']);
  });

  it('keeps double quotes inside an unquoted name', () => {
    expect(parseRecords('name\nSay "hi"\nBob\n').map((r) => r.name)).toEqual(['Say "hi"', 'Bob']);
  });

  it('keeps row order and quoted commas', () => {
    const csv = 'name\n"Smith, John"\nAlice Johnson\n';
    expect(parseRecords(csv).map((r) => r.name)).toEqual(['Smith, John', 'Alice Johnson']);
  });

  it('accepts rows shorter than the header', () => {
    const [amy] = parseRecords('name,text_size,ring_width\nAmy\n');
    expect(amy).toEqual({ name: 'Amy', params: DEFAULT_PARAMS, overrides: [] });
  });

  it('ignores a byte order mark', () => {
    expect(parseRecords('\uFEFFname\nAmy\n').map((r) => r.name)).toEqual(['Amy']);
  });

  it('returns nothing when the name column is absent', () => {
    expect(parseRecords('first,text_size\nAmy,9\n')).toEqual([]);
  });

  it('throws InputParseError on malformed CSV', () => {
    expect(() => parseRecords('name\n"unterminated\n')).toThrow(InputParseError);
  });
});

describe('readRecords', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'nametag-records-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a UTF-8 file', async () => {
    const file = path.join(dir, 'names.csv');
    await writeFile(file, 'name,text_size\nZoë,10\n', 'utf8');
    expect(await readRecords(file)).toEqual([
      { name: 'Zoë', params: { ...DEFAULT_PARAMS, text_size: 10 }, overrides: ['text_size'] },
    ]);
  });

  it('rejects a file that is not UTF-8', async () => {
    const file = path.join(dir, 'names.csv');
    await writeFile(file, Buffer.from([0x6e, 0x61, 0x6d, 0x65, 0x0a, 0xff, 0xfe, 0x0a]));
    await expect(readRecords(file)).rejects.toThrow(InputParseError);
  });

  it('rejects a missing file', async () => {
    await expect(readRecords(path.join(dir, 'nope.csv'))).rejects.toThrow(InputParseError);
  });
});
