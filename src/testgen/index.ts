/**
 * Test generation module
 *
 * Regenerates pytest files in full mode (whole module, replace) or
 * incremental mode (untested callables only, append).
 */

export {
  TestRegenerator,
  createTestRegenerator,
  selectMode,
  type GenerationBackend,
  type RegenerationMode,
  type RegenerationOutcome,
  type RegenerationRequest,
} from "./orchestrator.js";

export { stripFencing, mergeTestText } from "./merge.js";

export { buildFullPrompt, buildScopedPrompt } from "./prompts.js";

export {
  runBatch,
  createFileStore,
  type BatchFile,
  type BatchFileResult,
  type BatchOptions,
  type BatchSummary,
  type DocumentStore,
  type SkipReason,
} from "./batch.js";
