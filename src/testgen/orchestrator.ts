/**
 * Test regeneration for one source file.
 *
 * Full mode sends the whole module and the answer replaces the test file.
 * Incremental mode sends only the callables the existing test file does not
 * reference yet and appends the answer. The mode is decided afresh on every
 * call from the texts passed in; nothing is remembered between calls.
 */

import { diffCoverage } from "../core/coverage/differ.js";
import { extractInventory } from "../core/coverage/inventory.js";
import { extractReferences } from "../core/coverage/references.js";
import { sliceCallables } from "../core/coverage/slicer.js";
import type { CallableDescriptor } from "../core/coverage/types.js";
import { GapfillError, GenerationError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { ok, err } from "../lib/result.js";
import type { Result } from "../lib/result.js";

import { mergeTestText, stripFencing } from "./merge.js";
import { buildFullPrompt, buildScopedPrompt } from "./prompts.js";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Opaque text-to-text generation call
 */
export interface GenerationBackend {
  generateTests(prompt: string): Promise<string>;
}

export type RegenerationMode = "full" | "incremental";

export interface RegenerationRequest {
  /** Used in the prompt only, never read */
  sourcePath: string;
  sourceText: string;
  /** Current companion test text; undefined when no test file exists */
  existingTestText?: string;
  incremental: boolean;
}

export type RegenerationOutcome =
  /** Full mode produced a complete test file */
  | { kind: "generated"; mode: "full"; testText: string }
  /** Incremental mode appended tests for `targets` */
  | { kind: "updated"; mode: "incremental"; testText: string; targets: CallableDescriptor[] }
  /** Every public callable is already referenced; the backend was not called */
  | { kind: "covered"; mode: "incremental" }
  /** The backend answered with nothing usable */
  | { kind: "empty"; mode: RegenerationMode };

// =============================================================================
// MODE SELECTION
// =============================================================================

export function selectMode(request: RegenerationRequest): RegenerationMode {
  const hasTests = request.existingTestText !== undefined && request.existingTestText.trim().length > 0;
  return request.incremental && hasTests ? "incremental" : "full";
}

// =============================================================================
// REGENERATOR
// =============================================================================

export class TestRegenerator {
  private readonly log = logger.child("[regenerate]");

  constructor(private readonly backend: GenerationBackend) {}

  async regenerate(request: RegenerationRequest): Promise<Result<RegenerationOutcome, GapfillError>> {
    const mode = selectMode(request);
    this.log.debug(`${request.sourcePath}: ${mode} mode`);

    try {
      return ok(mode === "full"
        ? await this.regenerateFull(request)
        : await this.regenerateIncremental(request, request.existingTestText ?? ""));
    } catch (error) {
      if (error instanceof GapfillError) {
        return err(error);
      }
      return err(new GenerationError(
        `Test generation failed for ${request.sourcePath}: ${error instanceof Error ? error.message : String(error)}`,
        { sourcePath: request.sourcePath, mode }
      ));
    }
  }

  private async regenerateFull(request: RegenerationRequest): Promise<RegenerationOutcome> {
    const output = await this.backend.generateTests(buildFullPrompt(request.sourcePath, request.sourceText));
    const testText = stripFencing(output);

    if (testText.length === 0) {
      return { kind: "empty", mode: "full" };
    }
    return { kind: "generated", mode: "full", testText };
  }

  private async regenerateIncremental(request: RegenerationRequest, existing: string): Promise<RegenerationOutcome> {
    const inventory = await extractInventory(request.sourceText);
    const references = await extractReferences(existing);
    const untested = diffCoverage(inventory, references);

    if (untested.length === 0) {
      this.log.debug(`${request.sourcePath}: all ${inventory.length} public callables referenced`);
      return { kind: "covered", mode: "incremental" };
    }

    const names = [...new Set(untested.map((callable) => callable.name))];
    const sliced = await sliceCallables(request.sourceText, names);
    if (sliced.trim().length === 0) {
      return { kind: "covered", mode: "incremental" };
    }

    this.log.debug(`${request.sourcePath}: generating for ${names.join(", ")}`);
    const output = await this.backend.generateTests(buildScopedPrompt(request.sourcePath, sliced, names));
    const generated = stripFencing(output);

    if (generated.length === 0) {
      return { kind: "empty", mode: "incremental" };
    }
    return {
      kind: "updated",
      mode: "incremental",
      testText: mergeTestText(existing, generated),
      targets: untested,
    };
  }
}

export function createTestRegenerator(backend: GenerationBackend): TestRegenerator {
  return new TestRegenerator(backend);
}
