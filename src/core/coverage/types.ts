/**
 * Coverage analysis types
 */

/**
 * One public function or method in a source document.
 *
 * Descriptors describe one snapshot of the text; any edit makes them stale.
 */
export interface CallableDescriptor {
  /** Identifier, never starting with the private-name marker */
  readonly name: string;
  /** First line of the definition (1-indexed) */
  readonly startLine: number;
  /** Last line of the body (1-indexed, inclusive) */
  readonly endLine: number;
  /** Class the callable is defined directly in, if any */
  readonly enclosingType?: string;
}

/**
 * Names a test document appears to exercise
 */
export type ReferenceSet = ReadonlySet<string>;

/**
 * Names starting with this are private and never inventoried
 */
export const PRIVATE_NAME_MARKER = "_";
