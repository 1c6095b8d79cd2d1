/**
 * gapfill - find untested Python callables and generate pytest tests for them
 *
 * @packageDocumentation
 */

export { VERSION } from "./core/index.js";

// Syntax and coverage analysis
export {
  parsePython,
  extractInventory,
  extractReferences,
  diffCoverage,
  findUntestedCallables,
  sliceCallable,
  sliceSource,
  sliceCallables,
  isPublicName,
  analyzeFileCoverage,
  summarizeCoverage,
} from "./core/index.js";
export type {
  CallableDescriptor,
  ReferenceSet,
  FileCoverage,
  CoverageTotals,
} from "./core/index.js";

// Test generation
export {
  TestRegenerator,
  createTestRegenerator,
  selectMode,
  stripFencing,
  mergeTestText,
  buildFullPrompt,
  buildScopedPrompt,
  runBatch,
  createFileStore,
} from "./testgen/index.js";
export type {
  GenerationBackend,
  RegenerationMode,
  RegenerationOutcome,
  RegenerationRequest,
  BatchFile,
  BatchFileResult,
  BatchOptions,
  BatchSummary,
  DocumentStore,
} from "./testgen/index.js";

// Generation backends
export { AIService, createAIService, resolveAIConfig, AI_PROVIDERS } from "./ai/index.js";
export type { AIConfig, AIProvider, AIOverrides } from "./ai/index.js";

// Project layout and git
export { testPathFor, filterSourceFiles, listSourceFiles, isTestFile } from "./adapters/pytest.js";
export { getChangedFilesSinceBase, runGit } from "./git/changes.js";
export type { GitRunner, GitOutput } from "./git/changes.js";

// Configuration
export {
  ProjectConfigSchema,
  loadProjectConfig,
  saveProjectConfig,
  parseProjectConfig,
  defaultProjectConfig,
  findRepoRoot,
  CONFIG_FILE,
} from "./cli/config.js";
export type { ProjectConfig } from "./cli/config.js";

// Library utilities
export {
  GapfillError,
  ParserUnavailableError,
  ParseError,
  ConfigError,
  GenerationError,
  GitError,
  ok,
  err,
  unwrapOr,
  tryCatchAsync,
  logger,
} from "./lib/index.js";
export type { Result, LogLevel } from "./lib/index.js";
