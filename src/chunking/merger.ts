import type { TranslationResult } from "../types/translation";
import { TranslationError } from "../errors/index";

/**
 * Joins chunk translations in chunk-id order with a single space. Whitespace
 * on either side of a join is collapsed; interior whitespace is untouched.
 *
 * @throws TranslationError (IncompleteResults) when an expected chunk id is
 * missing or reported twice
 */
export function recombine(
  results: readonly TranslationResult[],
  expectedChunkIds: readonly number[]
): string {
  const byId = new Map<number, TranslationResult>();
  for (const result of results) {
    if (byId.has(result.chunkId)) {
      throw new TranslationError(
        `Chunk ${result.chunkId} has more than one translation result`,
        "IncompleteResults"
      );
    }
    byId.set(result.chunkId, result);
  }

  const missing = expectedChunkIds.filter((id) => !byId.has(id));
  if (missing.length > 0) {
    throw new TranslationError(
      `Missing translation results for chunk(s): ${missing.join(", ")}`,
      "IncompleteResults"
    );
  }

  const ordered = [...expectedChunkIds].sort((a, b) => a - b);
  let combined = "";
  for (const id of ordered) {
    const piece = byId.get(id)?.translatedText ?? "";
    if (!piece.trim()) continue;
    combined = combined ? `${combined.trimEnd()} ${piece.trimStart()}` : piece;
  }
  return combined;
}
