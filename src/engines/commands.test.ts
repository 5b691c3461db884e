import { describe, it, expect } from '@jest/globals';
import { MergeThresholdsSchema, RealignTuningSchema } from '../schemas/run-options.js';
import {
  buildCoverageInvocation,
  buildExtractInvocation,
  buildIntervalCallInvocation,
  buildMergeInvocation,
  buildRealignInvocation,
  type EngineBinaries,
} from './commands.js';

const binaries: EngineBinaries = {
  intervals: 'ecc-intervals',
  realign: 'ecc-realign',
  coverage: 'samtools',
  merge: 'ecc-merge',
  extract: 'ecc-extract',
};

describe('buildIntervalCallInvocation', () => {
  it('passes inputs, output and threads', () => {
    expect(
      buildIntervalCallInvocation(binaries, {
        sortedBam: 'sorted.bam',
        genome: 'hg38.fa',
        output: '/work/peaks.bed',
        threads: 4,
      })
    ).toEqual({
      engine: 'intervals',
      command: 'ecc-intervals',
      args: ['call', '--bam', 'sorted.bam', '--genome', 'hg38.fa', '--output', '/work/peaks.bed', '--threads', '4'],
    });
  });
});

describe('buildRealignInvocation', () => {
  it('passes the insert size distribution and every tuning value', () => {
    const invocation = buildRealignInvocation(binaries, {
      intervals: '/work/peaks.bed',
      candidatesBam: 'candidates.bam',
      sortedBam: 'sorted.bam',
      genome: 'hg38.fa',
      insertSize: { mean: 312.5, std: 41.25 },
      tuning: RealignTuningSchema.parse({}),
      threads: 2,
      output: '/work/ecctemp.txt',
    });

    expect(invocation.engine).toBe('realign');
    expect(invocation.command).toBe('ecc-realign');
    expect(invocation.args).toEqual([
      'realign',
      '--intervals', '/work/peaks.bed',
      '--candidates', 'candidates.bam',
      '--bam', 'sorted.bam',
      '--genome', 'hg38.fa',
      '--insert-mean', '312.5',
      '--insert-std', '41.25',
      '--std-multiplier', '4',
      '--mapq', '20',
      '--interval-probability', '0.01',
      '--edit-distance-fraction', '0.05',
      '--min-soft-clip', '8',
      '--max-alignments', '200',
      '--gap-open', '5',
      '--gap-extend', '1',
      '--alignment-probability', '0.99',
      '--threads', '2',
      '--output', '/work/ecctemp.txt',
    ]);
  });
});

describe('buildCoverageInvocation', () => {
  it('redirects stdout to the coverage table', () => {
    expect(buildCoverageInvocation(binaries, { sortedBam: 'sorted.bam', output: '/work/coverage.txt' })).toEqual({
      engine: 'coverage',
      command: 'samtools',
      args: ['depth', '-a', 'sorted.bam'],
      stdoutPath: '/work/coverage.txt',
    });
  });
});

describe('buildMergeInvocation', () => {
  const thresholds = MergeThresholdsSchema.parse({});

  it('passes the coverage table when present', () => {
    const invocation = buildMergeInvocation(binaries, {
      realigned: '/work/ecctemp.txt',
      genome: 'hg38.fa',
      coverage: '/work/coverage.txt',
      thresholds,
      output: 'report.tsv',
    });

    expect(invocation.args).toEqual([
      'merge',
      '--realigned', '/work/ecctemp.txt',
      '--genome', 'hg38.fa',
      '--coverage', '/work/coverage.txt',
      '--allele-frequency', '0.1',
      '--discordant-reads', '3',
      '--split-reads', '0',
      '--split-quality', '0',
      '--merge-fraction', '0.99',
      '--extension', '100',
      '--bases', '200',
      '--coverage-ratio', '0',
      '--output', 'report.tsv',
    ]);
  });

  it('asks for the coverage-free merge when coverage was skipped', () => {
    const invocation = buildMergeInvocation(binaries, {
      realigned: '/work/ecctemp.txt',
      genome: 'hg38.fa',
      thresholds,
      output: 'report.tsv',
    });

    expect(invocation.args.slice(0, 6)).toEqual([
      'merge',
      '--realigned', '/work/ecctemp.txt',
      '--genome', 'hg38.fa',
      '--no-coverage',
    ]);
    expect(invocation.args).not.toContain('--coverage');
  });
});

describe('buildExtractInvocation', () => {
  const params = {
    input: 'qname.bam',
    output: 'candidates.bam',
    mappingQuality: 10,
    includeDiscordants: true,
    includeSoftClipped: true,
    includeHardClipped: true,
  };

  it('includes every read class by default', () => {
    expect(buildExtractInvocation(binaries, params)).toEqual({
      engine: 'extract',
      command: 'ecc-extract',
      args: ['extract', '--bam', 'qname.bam', '--output', 'candidates.bam', '--mapq', '10'],
      cwd: undefined,
    });
  });

  it('adds an exclusion flag per excluded read class and runs in the given directory', () => {
    const invocation = buildExtractInvocation(binaries, {
      ...params,
      includeDiscordants: false,
      includeHardClipped: false,
      cwd: '/work',
    });

    expect(invocation.args.slice(-2)).toEqual(['--no-discordants', '--no-hard-clipped']);
    expect(invocation.cwd).toBe('/work');
  });
});
