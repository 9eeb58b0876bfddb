export const DEFAULT_MAX_OVERLAP_CHARS = 80;

/**
 * Length of the longest suffix of `prevText` that is also a prefix of
 * `newText`, looking at no more than `maxOverlap` characters. Returns 0 when
 * nothing matches.
 */
export function findOverlap(
  prevText: string,
  newText: string,
  maxOverlap = DEFAULT_MAX_OVERLAP_CHARS
): number {
  if (!prevText || !newText) return 0;
  const checkLen = Math.min(maxOverlap, prevText.length, newText.length);
  for (let len = checkLen; len > 0; len -= 1) {
    if (prevText.endsWith(newText.slice(0, len))) {
      return len;
    }
  }
  return 0;
}

/** Drops the part of `newText` already present at the end of `prevText`. */
export function dedupSeam(
  prevText: string,
  newText: string,
  maxOverlap = DEFAULT_MAX_OVERLAP_CHARS
): string {
  const overlap = findOverlap(prevText, newText, maxOverlap);
  if (overlap > 0) {
    return newText.slice(overlap).trimStart();
  }
  return newText;
}
