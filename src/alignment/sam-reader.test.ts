import { describe, it, expect, jest } from '@jest/globals';
import { Readable } from 'node:stream';
import { createSamReadStats, parseSamLine, readSamRecords } from './sam-reader.js';
import type { AlignmentRecord } from './types.js';

const samLine = (qname: string, flag: number, mapq: number, cigar: string, tlen: number): string =>
  [qname, flag, 'chr1', 100, mapq, cigar, '=', 300, tlen, '*', '*'].join('\t');

async function collect(source: AsyncIterable<AlignmentRecord>): Promise<AlignmentRecord[]> {
  const records: AlignmentRecord[] = [];
  for await (const record of source) {
    records.push(record);
  }
  return records;
}

describe('parseSamLine', () => {
  it('parses the mandatory fields of a record', () => {
    expect(parseSamLine(samLine('r1', 99, 60, '100M', 300))).toEqual({
      kind: 'record',
      record: {
        queryName: 'r1',
        mateRole: 'first',
        mappingQuality: 60,
        cigar: '100M',
        isReverseStrand: false,
        isProperlyPaired: true,
        templateLength: 300,
        flag: 99,
        referenceName: 'chr1',
        position: 100,
      },
    });
  });

  it('reads strand and mate role from the flag', () => {
    const result = parseSamLine(samLine('r1', 147, 60, '100M', -300));

    expect(result.kind).toBe('record');
    if (result.kind === 'record') {
      expect(result.record.mateRole).toBe('second');
      expect(result.record.isReverseStrand).toBe(true);
      expect(result.record.templateLength).toBe(-300);
    }
  });

  it('passes an unparseable CIGAR through untouched', () => {
    const result = parseSamLine(samLine('r1', 99, 60, '10Q', 300));

    expect(result.kind).toBe('record');
    if (result.kind === 'record') {
      expect(result.record.cigar).toBe('10Q');
    }
  });

  it('recognizes header lines', () => {
    expect(parseSamLine('@SQ\tSN:chr1\tLN:1000')).toEqual({ kind: 'header' });
  });

  it('rejects lines with missing fields', () => {
    expect(parseSamLine('r1\t99\tchr1')).toEqual({
      kind: 'invalid',
      error: 'Expected at least 11 fields, found 3',
    });
  });

  it('rejects a non-numeric MAPQ', () => {
    const line = samLine('r1', 99, 60, '100M', 300).replace('\t60\t', '\tx\t');
    expect(parseSamLine(line)).toEqual({ kind: 'invalid', error: 'Invalid MAPQ "x"' });
  });

  it('rejects a MAPQ above 255', () => {
    expect(parseSamLine(samLine('r1', 99, 256, '100M', 300))).toEqual({
      kind: 'invalid',
      error: 'Invalid MAPQ "256"',
    });
  });

  it('rejects a non-numeric TLEN', () => {
    const line = ['r1', 99, 'chr1', 100, 60, '100M', '=', 300, '3.5', '*', '*'].join('\t');
    expect(parseSamLine(line)).toEqual({ kind: 'invalid', error: 'Invalid TLEN "3.5"' });
  });
});

describe('readSamRecords', () => {
  it('yields records in order and counts what it skipped', async () => {
    const text = [
      '@HD\tVN:1.6',
      '',
      samLine('a', 99, 60, '100M', 300),
      'garbage',
      samLine('a', 147, 60, '100M', -300),
    ].join('\n');
    const stats = createSamReadStats();
    const onInvalidLine = jest.fn<(lineNumber: number, error: string) => void>();

    const records = await collect(readSamRecords(Readable.from([text]), { stats, onInvalidLine }));

    expect(records.map((r) => `${r.queryName}/${r.mateRole}`)).toEqual(['a/first', 'a/second']);
    expect(stats).toEqual({ linesRead: 5, headerLines: 1, records: 2, invalidLines: 1 });
    expect(onInvalidLine).toHaveBeenCalledWith(4, 'Expected at least 11 fields, found 1');
  });

  it('handles records split across chunks', async () => {
    const line = samLine('b', 99, 42, '100M', 250);
    const chunks = [line.slice(0, 10), line.slice(10) + '\n'];

    const records = await collect(readSamRecords(Readable.from(chunks)));

    expect(records).toHaveLength(1);
    expect(records[0].mappingQuality).toBe(42);
  });

  it('stops reading when the consumer breaks', async () => {
    const lines = ['c', 'd', 'e'].map((name) => samLine(name, 99, 60, '100M', 300) + '\n');
    const stats = createSamReadStats();

    for await (const record of readSamRecords(Readable.from(lines), { stats })) {
      expect(record.queryName).toBe('c');
      break;
    }

    expect(stats.records).toBe(1);
  });
});
