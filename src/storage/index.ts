/**
 * Storage Layer
 *
 * Working directory lifecycle and checkpoint artifact paths.
 *
 * @module storage
 */

// Path utilities
export { getImplicitWorkingDir, getArtifactPath, type ArtifactName } from './paths.js';

// Filesystem checks
export { pathExists } from './files.js';

// Working directory session
export {
  openWorkingDirectory,
  WorkingDirectorySession,
  WorkingDirectoryError,
  type OpenWorkingDirectoryOptions,
} from './workdir.js';
