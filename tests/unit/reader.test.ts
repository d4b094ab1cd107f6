import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Readable } from 'stream';
import { Decimal128, ObjectId } from 'mongodb';
import {
  parseJsonArray,
  parseRecordLine,
  readRecords,
  resolveInputFormat,
} from '../../src/lib/reader/index.js';
import { FileIOError, InputReadError } from '../../src/utils/errors.js';

async function collect(records: AsyncIterable<unknown>): Promise<unknown[]> {
  const collected: unknown[] = [];
  for await (const record of records) {
    collected.push(record);
  }
  return collected;
}

describe('Reader', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'typecensus-reader-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('resolveInputFormat', () => {
    it('should detect JSON arrays by extension', () => {
      expect(resolveInputFormat('records.json')).toBe('json');
      expect(resolveInputFormat('RECORDS.JSON', 'auto')).toBe('json');
      expect(resolveInputFormat('records.ndjson')).toBe('ndjson');
      expect(resolveInputFormat('-')).toBe('ndjson');
    });

    it('should honor an explicit format', () => {
      expect(resolveInputFormat('records.json', 'ndjson')).toBe('ndjson');
      expect(resolveInputFormat('stdin', 'json')).toBe('json');
    });
  });

  describe('parseRecordLine', () => {
    it('should parse plain JSON', () => {
      expect(parseRecordLine('{"a":1,"b":"x"}', 1)).toEqual({ a: 1, b: 'x' });
    });

    it('should revive Extended JSON wrappers', () => {
      const record = parseRecordLine(
        '{"when":{"$date":"2024-01-01T00:00:00Z"},"id":{"$oid":"507f1f77bcf86cd799439011"},"amount":{"$numberDecimal":"9.99"}}',
        1,
      );

      expect(record).toEqual({
        when: new Date('2024-01-01T00:00:00Z'),
        id: expect.any(ObjectId),
        amount: expect.any(Decimal128),
      });
    });

    it('should report the failing line number', () => {
      let caught: unknown;
      try {
        parseRecordLine('{not json', 3);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InputReadError);
      expect(caught instanceof InputReadError && caught.details).toEqual({ lineNumber: 3 });
    });
  });

  describe('parseJsonArray', () => {
    it('should return the array elements', () => {
      expect(parseJsonArray('[{"a":1},{"b":2}]', 'inline')).toEqual([{ a: 1 }, { b: 2 }]);
    });

    it('should reject a document that is not an array', () => {
      expect(() => parseJsonArray('{"a":1}', 'inline')).toThrow(
        'Expected a JSON array of records in inline',
      );
    });

    it('should reject malformed JSON', () => {
      expect(() => parseJsonArray('[{"a":', 'inline')).toThrow(InputReadError);
    });
  });

  describe('readRecords', () => {
    it('should stream NDJSON files and skip blank lines', async () => {
      const path = join(dir, 'records.ndjson');
      writeFileSync(path, '{"a":1}\n\n  \n{"a":"x"}\r\n{"b":null}\n', 'utf8');

      expect(await collect(readRecords(path))).toEqual([{ a: 1 }, { a: 'x' }, { b: null }]);
    });

    it('should read JSON array files', async () => {
      const path = join(dir, 'records.json');
      writeFileSync(path, '[{"a":1},{"a":2.5}]', 'utf8');

      expect(await collect(readRecords(path))).toEqual([{ a: 1 }, { a: 2.5 }]);
    });

    it('should read NDJSON from stdin', async () => {
      const stdin = Readable.from(['{"a":1}\n{"b":', '2}\n']);

      expect(await collect(readRecords('-', { stdin }))).toEqual([{ a: 1 }, { b: 2 }]);
    });

    it('should read a JSON array from stdin', async () => {
      const stdin = Readable.from([Buffer.from('[{"a":'), Buffer.from('true}]')]);

      expect(await collect(readRecords('stdin', { format: 'json', stdin }))).toEqual([
        { a: true },
      ]);
    });

    it('should fail with FileIOError for a missing file', async () => {
      await expect(collect(readRecords(join(dir, 'missing.ndjson')))).rejects.toThrow(
        FileIOError,
      );
    });

    it('should fail with InputReadError on a malformed line', async () => {
      const path = join(dir, 'broken.ndjson');
      writeFileSync(path, '{"a":1}\n{"a":\n', 'utf8');

      await expect(collect(readRecords(path))).rejects.toThrow(
        'Failed to parse NDJSON line 2',
      );
    });
  });
});
