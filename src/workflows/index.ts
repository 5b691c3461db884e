export {
  runRealignPipeline,
  type RealignWorkflowDependencies,
  type RealignWorkflowResult,
} from './realign.js';
export { runExtraction, type ExtractWorkflowDependencies } from './extract.js';
