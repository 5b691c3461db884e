import { describe, it, expect } from '@jest/globals';
import type { AlignmentRecord } from '../alignment/types.js';
import { EmptySampleError } from './errors.js';
import { estimateInsertSize } from './estimator.js';

function first(queryName: string, templateLength: number, overrides: Partial<AlignmentRecord> = {}): AlignmentRecord {
  return {
    queryName,
    mateRole: 'first',
    mappingQuality: 60,
    cigar: '100M',
    isReverseStrand: false,
    isProperlyPaired: true,
    templateLength,
    ...overrides,
  };
}

function second(queryName: string, templateLength: number, overrides: Partial<AlignmentRecord> = {}): AlignmentRecord {
  return {
    queryName,
    mateRole: 'second',
    mappingQuality: 60,
    cigar: '100M',
    isReverseStrand: true,
    isProperlyPaired: true,
    templateLength: -templateLength,
    ...overrides,
  };
}

const pair = (queryName: string, templateLength: number): AlignmentRecord[] => [
  first(queryName, templateLength),
  second(queryName, templateLength),
];

const options = { sampleSize: 100, mapqCutoff: 60 };

describe('estimateInsertSize', () => {
  it('computes mean and population std of accepted pairs', async () => {
    const records = [...pair('a', 300), ...pair('b', 320), ...pair('c', 340)];

    const stats = await estimateInsertSize(records, options);

    expect(stats.mean).toBe(320);
    expect(stats.std).toBeCloseTo(16.3299, 4);
    expect(stats.sampleCount).toBe(3);
    expect(stats.sampleSize).toBe(100);
    expect(stats.saturated).toBe(false);
    expect(stats.recordsScanned).toBe(6);
    expect(stats.pairsEvaluated).toBe(3);
    expect(stats.unmatchedFirstMates).toBe(0);
    expect(stats.malformedRecords).toBe(0);
  });

  it('stops pulling records once the sample is full', async () => {
    let pulled = 0;
    function* source(): Generator<AlignmentRecord> {
      for (const name of ['a', 'b', 'c', 'd', 'e']) {
        for (const record of pair(name, 300)) {
          pulled++;
          yield record;
        }
      }
    }

    const stats = await estimateInsertSize(source(), { sampleSize: 2, mapqCutoff: 60 });

    expect(pulled).toBe(4);
    expect(stats.recordsScanned).toBe(4);
    expect(stats.sampleCount).toBe(2);
    expect(stats.saturated).toBe(true);
  });

  it('reads asynchronous sources', async () => {
    async function* source(): AsyncGenerator<AlignmentRecord> {
      yield* pair('a', 200);
      yield* pair('b', 400);
    }

    const stats = await estimateInsertSize(source(), options);

    expect(stats.mean).toBe(300);
    expect(stats.std).toBe(100);
  });

  it('samples the template length of the first mate', async () => {
    const stats = await estimateInsertSize(
      [first('a', 250), second('a', 250, { templateLength: -999 })],
      options
    );

    expect(stats.mean).toBe(250);
  });

  it('counts rejected pairs by reason', async () => {
    const records = [
      first('q', 300, { mappingQuality: 10 }),
      second('q', 300),
      first('p', 300, { isProperlyPaired: false }),
      second('p', 300),
      first('h', 300),
      second('h', 300, { cigar: '5H95M' }),
      first('s', 300, { cigar: '10S90M' }),
      second('s', 300),
      first('o', 300, { isReverseStrand: true }),
      second('o', 300),
      first('t', 0),
      second('t', 0),
      ...pair('ok', 300),
    ];

    const stats = await estimateInsertSize(records, options);

    expect(stats.rejections).toEqual({
      low_mapq: 1,
      not_proper_pair: 1,
      hard_clipped: 1,
      soft_clipped: 1,
      orientation: 1,
      non_positive_template_length: 1,
    });
    expect(stats.pairsEvaluated).toBe(7);
    expect(stats.sampleCount).toBe(1);
    expect(stats.mean).toBe(300);
    expect(stats.std).toBe(0);
  });

  it('skips records with an unparseable CIGAR', async () => {
    const records = [...pair('a', 300), first('b', 300, { cigar: '10Q' }), second('b', 300), ...pair('c', 310)];

    const stats = await estimateInsertSize(records, options);

    expect(stats.malformedRecords).toBe(1);
    expect(stats.pairsEvaluated).toBe(2);
    expect(stats.sampleCount).toBe(2);
    expect(stats.mean).toBe(305);
  });

  it('loses pairs whose mates are not adjacent', async () => {
    const records = [first('a', 300), first('b', 500), second('a', 300), second('b', 500)];

    const stats = await estimateInsertSize(records, options);

    expect(stats.unmatchedFirstMates).toBe(1);
    expect(stats.pairsEvaluated).toBe(1);
    expect(stats.mean).toBe(500);
  });

  it('pairs a repeated second mate with the same buffered first mate', async () => {
    const records = [first('a', 300), second('a', 300), second('a', 300)];

    const stats = await estimateInsertSize(records, options);

    expect(stats.pairsEvaluated).toBe(2);
    expect(stats.sampleCount).toBe(2);
  });

  it('ignores unpaired records', async () => {
    const records = [
      first('a', 300),
      { ...first('x', 100), mateRole: 'unpaired' as const },
      second('a', 300),
    ];

    const stats = await estimateInsertSize(records, options);

    expect(stats.sampleCount).toBe(1);
    expect(stats.recordsScanned).toBe(3);
  });

  it('throws EmptySampleError when no pair passes the filter', async () => {
    const records = [first('a', 300, { mappingQuality: 5 }), second('a', 300)];

    const promise = estimateInsertSize(records, options);

    await expect(promise).rejects.toBeInstanceOf(EmptySampleError);
    await expect(promise).rejects.toThrow(
      'No read pair passed the insert size filter (2 records scanned, 1 pairs evaluated, 0 malformed records skipped)'
    );
  });

  it('throws EmptySampleError for an empty stream', async () => {
    await expect(estimateInsertSize([], options)).rejects.toMatchObject({
      name: 'EmptySampleError',
      recordsScanned: 0,
      pairsEvaluated: 0,
    });
  });

  it('rejects a non-positive sample size', async () => {
    await expect(estimateInsertSize([], { sampleSize: 0, mapqCutoff: 60 })).rejects.toThrow(
      new RangeError('sampleSize must be a positive integer, got 0')
    );
  });

  it('rejects a negative MAPQ cutoff', async () => {
    await expect(estimateInsertSize([], { sampleSize: 10, mapqCutoff: -1 })).rejects.toThrow(RangeError);
  });
});
