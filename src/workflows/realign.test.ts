import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { AlignmentRecord } from '../alignment/types.js';
import type { EngineBinaries } from '../engines/commands.js';
import type { EngineInvocation, EngineResult, EngineRunner } from '../engines/types.js';
import { StageExecutionError } from '../pipeline/controller.js';
import { RealignRunOptionsSchema } from '../schemas/run-options.js';
import { pathExists } from '../storage/files.js';
import { runRealignPipeline } from './realign.js';

const BINARIES: EngineBinaries = {
  intervals: 'ecc-intervals',
  realign: 'ecc-realign',
  coverage: 'samtools',
  merge: 'ecc-merge',
  extract: 'ecc-extract',
};

/**
 * Writes each engine's output file, like the real engines would, and
 * fails the engine named in `failOn`.
 */
class ArtifactWritingRunner implements EngineRunner {
  readonly engines: string[] = [];

  constructor(private readonly failOn?: EngineInvocation['engine']) {}

  async run(invocation: EngineInvocation): Promise<EngineResult> {
    this.engines.push(invocation.engine);
    if (invocation.engine === this.failOn) {
      throw new Error(`${invocation.engine} exited with status 1`);
    }
    const outputIndex = invocation.args.indexOf('--output');
    const output = invocation.stdoutPath ?? (outputIndex >= 0 ? invocation.args[outputIndex + 1] : undefined);
    if (output !== undefined) {
      await fs.writeFile(output, `${invocation.engine}\n`);
    }
    return { engine: invocation.engine, exitCode: 0, signal: null, durationMs: 0 };
  }
}

function records(): AlignmentRecord[] {
  return [
    { queryName: 'a', mateRole: 'first', mappingQuality: 60, cigar: '100M', isReverseStrand: false, isProperlyPaired: true, templateLength: 310 },
    { queryName: 'a', mateRole: 'second', mappingQuality: 60, cigar: '100M', isReverseStrand: true, isProperlyPaired: true, templateLength: -310 },
  ];
}

describe('runRealignPipeline', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'realign-workflow-test-'));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  function options(overrides: { workingDir?: string; dryRun?: boolean } = {}) {
    return RealignRunOptionsSchema.parse({
      inputs: {
        sortedBam: 'sample.sorted.bam',
        queryNameBam: 'sample.qname.bam',
        candidatesBam: 'candidates.bam',
        genome: 'genome.fa',
        output: path.join(testDir, 'report.tsv'),
        workingDir: overrides.workingDir,
      },
      dryRun: overrides.dryRun ?? false,
    });
  }

  it('runs every engine and removes the implicit working directory', async () => {
    const runner = new ArtifactWritingRunner();

    const result = await runRealignPipeline(options(), {
      runner,
      binaries: BINARIES,
      openSource: records,
      workdir: { cwd: testDir, pid: 101 },
    });

    expect(runner.engines).toEqual(['intervals', 'realign', 'coverage', 'merge']);
    expect(result.stagesExecuted).toHaveLength(5);
    expect(result.state.insertSize?.mean).toBe(310);
    expect(result.workingDir).toBe(path.join(testDir, 'temp_files_101'));
    expect(result.workingDirRemoved).toBe(true);
    await expect(pathExists(result.workingDir)).resolves.toBe(false);
    await expect(pathExists(path.join(testDir, 'report.tsv'))).resolves.toBe(true);
  });

  it('keeps the implicit working directory when a stage fails', async () => {
    const promise = runRealignPipeline(options(), {
      runner: new ArtifactWritingRunner('realign'),
      binaries: BINARIES,
      openSource: records,
      workdir: { cwd: testDir, pid: 102 },
    });

    await expect(promise).rejects.toBeInstanceOf(StageExecutionError);
    const workingDir = path.join(testDir, 'temp_files_102');
    await expect(pathExists(path.join(workingDir, 'peaks.bed'))).resolves.toBe(true);
    await expect(pathExists(path.join(workingDir, 'ecctemp.txt'))).resolves.toBe(false);
  });

  it('keeps a supplied working directory after success', async () => {
    const workingDir = path.join(testDir, 'run1');

    const result = await runRealignPipeline(options({ workingDir }), {
      runner: new ArtifactWritingRunner(),
      binaries: BINARIES,
      openSource: records,
    });

    expect(result.workingDirRemoved).toBe(false);
    await expect(pathExists(path.join(workingDir, 'coverage.txt'))).resolves.toBe(true);
  });

  it('keeps a supplied working directory and its checkpoints when a stage fails', async () => {
    const workingDir = path.join(testDir, 'run-failed');

    await expect(
      runRealignPipeline(options({ workingDir }), {
        runner: new ArtifactWritingRunner('merge'),
        binaries: BINARIES,
        openSource: records,
      })
    ).rejects.toMatchObject({ stageId: '05_merge' });

    await expect(fs.readdir(workingDir).then((names) => names.sort())).resolves.toEqual([
      'coverage.txt',
      'ecctemp.txt',
      'peaks.bed',
    ]);
  });

  it('resumes a failed run from its checkpoints', async () => {
    const workingDir = path.join(testDir, 'run2');
    await expect(
      runRealignPipeline(options({ workingDir }), {
        runner: new ArtifactWritingRunner('coverage'),
        binaries: BINARIES,
        openSource: records,
      })
    ).rejects.toMatchObject({ stageId: '04_coverage' });

    const runner = new ArtifactWritingRunner();
    const result = await runRealignPipeline(options({ workingDir }), {
      runner,
      binaries: BINARIES,
      openSource: records,
    });

    expect(result.stagesSkipped).toEqual(['01_candidate_intervals', '03_realign']);
    expect(result.stagesExecuted).toEqual(['02_insert_size', '04_coverage', '05_merge']);
    expect(runner.engines).toEqual(['coverage', 'merge']);
  });

  it('runs no engine in dry-run mode', async () => {
    const runner = new ArtifactWritingRunner();

    const result = await runRealignPipeline(options({ dryRun: true }), {
      runner,
      binaries: BINARIES,
      openSource: records,
      workdir: { cwd: testDir, pid: 103 },
    });

    expect(runner.engines).toEqual([]);
    expect(result.stagesPlanned).toHaveLength(5);
    expect(result.workingDirRemoved).toBe(true);
  });
});
