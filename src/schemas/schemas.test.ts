/**
 * Schema Validation Tests
 *
 * @module schemas/schemas.test
 */

import { describe, it, expect } from '@jest/globals';
import {
  ExtractRunOptionsSchema,
  RealignRunOptionsSchema,
  formatIssues,
} from './index.js';

const inputs = {
  sortedBam: 'sample.sorted.bam',
  queryNameBam: 'sample.qname.bam',
  candidatesBam: 'candidates.bam',
  genome: 'genome.fa',
  output: 'report.tsv',
};

describe('RealignRunOptionsSchema', () => {
  it('fills every default', () => {
    const options = RealignRunOptionsSchema.parse({ inputs });

    expect(options.threads).toBe(1);
    expect(options.insertSize).toEqual({ sampleSize: 100000, mapqCutoff: 60 });
    expect(options.realign.stdMultiplier).toBe(4);
    expect(options.realign.alignmentProbability).toBe(0.99);
    expect(options.merge.discordantReads).toBe(3);
    expect(options.skipCoverage).toBe(false);
    expect(options.ignoreEngineStatus).toBe(false);
    expect(options.dryRun).toBe(false);
    expect(options.inputs.workingDir).toBeUndefined();
  });

  it('keeps supplied tuning values', () => {
    const options = RealignRunOptionsSchema.parse({
      inputs,
      insertSize: { sampleSize: 500 },
      realign: { mappingQuality: 30 },
    });

    expect(options.insertSize).toEqual({ sampleSize: 500, mapqCutoff: 60 });
    expect(options.realign.mappingQuality).toBe(30);
    expect(options.realign.gapOpen).toBe(5);
  });

  it('trims paths and rejects empty ones', () => {
    expect(RealignRunOptionsSchema.parse({ inputs: { ...inputs, genome: ' genome.fa ' } }).inputs.genome).toBe(
      'genome.fa'
    );

    const result = RealignRunOptionsSchema.safeParse({ inputs: { ...inputs, output: '  ' } });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatIssues(result.error)).toEqual(['inputs.output: Path must not be empty']);
    }
  });

  it('rejects out-of-range values', () => {
    expect(RealignRunOptionsSchema.safeParse({ inputs, threads: 0 }).success).toBe(false);
    expect(RealignRunOptionsSchema.safeParse({ inputs, insertSize: { sampleSize: 1.5 } }).success).toBe(false);
    expect(RealignRunOptionsSchema.safeParse({ inputs, realign: { mappingQuality: 256 } }).success).toBe(false);
    expect(RealignRunOptionsSchema.safeParse({ inputs, merge: { alleleFrequency: 1.2 } }).success).toBe(false);
  });
});

describe('ExtractRunOptionsSchema', () => {
  it('includes every read category by default', () => {
    const options = ExtractRunOptionsSchema.parse({ input: 'in.bam', output: 'out.bam' });

    expect(options).toEqual({
      input: 'in.bam',
      output: 'out.bam',
      mappingQuality: 10,
      includeDiscordants: true,
      includeSoftClipped: true,
      includeHardClipped: true,
      ignoreEngineStatus: false,
    });
  });

  it('requires input and output', () => {
    const result = ExtractRunOptionsSchema.safeParse({ input: 'in.bam' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatIssues(result.error)).toEqual(['output: Required']);
    }
  });
});

describe('formatIssues', () => {
  it('omits the path for top-level issues', () => {
    const result = ExtractRunOptionsSchema.safeParse('not an object');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatIssues(result.error)).toEqual(['Expected object, received string']);
    }
  });
});
