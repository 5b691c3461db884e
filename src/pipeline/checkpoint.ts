/**
 * Checkpoint Status
 *
 * A stage is complete when its checkpoint artifact exists. Content is not
 * inspected: existence alone is authoritative.
 *
 * @module pipeline/checkpoint
 * @see CheckpointStatus
 */

import { pathExists } from '../storage/files.js';
import type { CheckpointStatus, PipelineStage } from './types.js';

/**
 * Read a stage's completion status from disk.
 *
 * @returns `completed` when the stage has an artifact path and something
 *   exists there; `not_started` otherwise (including stages without one)
 *
 * @example
 * const status = await getCheckpointStatus(stage);
 * if (status.kind === 'completed') {
 *   logger.info(`found ${status.artifactPath}`);
 * }
 */
export async function getCheckpointStatus(
  stage: Pick<PipelineStage, 'checkpointArtifactPath'>
): Promise<CheckpointStatus> {
  const artifactPath = stage.checkpointArtifactPath;
  if (artifactPath === undefined) {
    return { kind: 'not_started' };
  }

  if (await pathExists(artifactPath)) {
    return { kind: 'completed', artifactPath };
  }
  return { kind: 'not_started' };
}
