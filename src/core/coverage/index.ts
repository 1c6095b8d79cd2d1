export { extractInventory, isPublicName } from "./inventory.js";
export { extractReferences } from "./references.js";
export { diffCoverage, findUntestedCallables } from "./differ.js";
export { sliceCallable, sliceSource, sliceCallables } from "./slicer.js";
export { PRIVATE_NAME_MARKER } from "./types.js";
export type { CallableDescriptor, ReferenceSet } from "./types.js";
export { analyzeFileCoverage, summarizeCoverage } from "./report.js";
export type { FileCoverage, CoverageTotals } from "./report.js";
