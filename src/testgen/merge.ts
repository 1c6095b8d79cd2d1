/**
 * Merging generated tests into an existing test file
 */

const FENCE = "```";

/**
 * Remove a surrounding markdown code fence from backend output.
 *
 * Output is trimmed first. An opening fence line (with or without a language
 * tag) and a closing fence line are dropped. A fence on a single line is
 * stripped from both ends, and a lone fence collapses to "".
 */
export function stripFencing(text: string): string {
  let result = text.trim();

  if (result.startsWith(FENCE)) {
    const firstNewline = result.indexOf("\n");
    if (firstNewline === -1) {
      if (result === FENCE) {
        return "";
      }
      result = result.slice(FENCE.length).trim();
    } else {
      result = result.slice(firstNewline + 1);
    }
  }

  result = result.trimEnd();
  if (result.endsWith(FENCE)) {
    const lastNewline = result.lastIndexOf("\n");
    result = lastNewline === -1
      ? result.slice(0, -FENCE.length).trim()
      : result.slice(0, lastNewline).trimEnd();
  }

  return result;
}

/**
 * Append generated tests to existing test text.
 *
 * Existing content is never reordered, rewritten or deduplicated; only its
 * trailing line breaks are normalised so one blank line precedes the
 * appended block.
 */
export function mergeTestText(existing: string | undefined, generated: string): string {
  if (generated.length === 0) {
    return existing ?? "";
  }
  if (existing === undefined || existing.trim().length === 0) {
    return generated;
  }

  const body = existing.replace(/(?:\r?\n[ \t]*)+$/, "");
  return `${body}\n\n${generated}`;
}
