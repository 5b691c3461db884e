import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { EngineBinaries } from '../engines/commands.js';
import type { EngineInvocation, EngineResult, EngineRunner } from '../engines/types.js';
import { ExtractRunOptionsSchema } from '../schemas/run-options.js';
import { pathExists } from '../storage/files.js';
import { runExtraction } from './extract.js';

const BINARIES: EngineBinaries = {
  intervals: 'ecc-intervals',
  realign: 'ecc-realign',
  coverage: 'samtools',
  merge: 'ecc-merge',
  extract: 'ecc-extract',
};

class RecordingRunner implements EngineRunner {
  readonly invocations: EngineInvocation[] = [];

  async run(invocation: EngineInvocation): Promise<EngineResult> {
    this.invocations.push(invocation);
    return { engine: invocation.engine, exitCode: 0, signal: null, durationMs: 0 };
  }
}

describe('runExtraction', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'extract-workflow-test-'));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('passes paths through unchanged without a working directory', async () => {
    const runner = new RecordingRunner();
    const options = ExtractRunOptionsSchema.parse({ input: 'in.bam', output: 'out.bam' });

    await runExtraction(options, { runner, binaries: BINARIES });

    expect(runner.invocations).toEqual([
      {
        engine: 'extract',
        command: 'ecc-extract',
        args: ['extract', '--bam', 'in.bam', '--output', 'out.bam', '--mapq', '10'],
        cwd: undefined,
      },
    ]);
  });

  it('runs inside the working directory with resolved paths', async () => {
    const runner = new RecordingRunner();
    const options = ExtractRunOptionsSchema.parse({ input: 'in.bam', output: 'out.bam', workingDir: 'scratch' });

    await runExtraction(options, { runner, binaries: BINARIES, workdir: { cwd: testDir } });

    const invocation = runner.invocations[0];
    expect(invocation?.cwd).toBe(path.join(testDir, 'scratch'));
    expect(invocation?.args.slice(1, 5)).toEqual([
      '--bam',
      path.join(testDir, 'in.bam'),
      '--output',
      path.join(testDir, 'out.bam'),
    ]);
    await expect(pathExists(path.join(testDir, 'scratch'))).resolves.toBe(true);
  });

  it('forwards the category switches', async () => {
    const runner = new RecordingRunner();
    const options = ExtractRunOptionsSchema.parse({
      input: 'in.bam',
      output: 'out.bam',
      mappingQuality: 30,
      includeDiscordants: false,
      includeHardClipped: false,
    });

    await runExtraction(options, { runner, binaries: BINARIES });

    expect(runner.invocations[0]?.args).toEqual([
      'extract',
      '--bam', 'in.bam',
      '--output', 'out.bam',
      '--mapq', '30',
      '--no-discordants',
      '--no-hard-clipped',
    ]);
  });

  it('propagates an engine failure', async () => {
    const runner: EngineRunner = {
      run: async () => {
        throw new Error('ecc-extract exited with status 2');
      },
    };
    const options = ExtractRunOptionsSchema.parse({ input: 'in.bam', output: 'out.bam' });

    await expect(runExtraction(options, { runner, binaries: BINARIES })).rejects.toThrow(
      'ecc-extract exited with status 2'
    );
  });
});
