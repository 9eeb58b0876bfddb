import type { Segment, WordToken } from "./types.js";

export const DEFAULT_EPSILON_SEC = 0.01;

type Timed = { start: number };

// The previous chunk owns every timestamp before `ownedBoundarySec`; anything
// the current chunk emitted there came from the overlap it was given.
function trimTimed<T extends Timed>(
  units: readonly T[],
  ownedBoundarySec: number,
  epsilonSec: number
): T[] {
  const boundary = ownedBoundarySec - epsilonSec;
  return units.filter((u) => u.start >= boundary);
}

export function trimWords(
  words: readonly WordToken[],
  ownedBoundarySec: number,
  epsilonSec = DEFAULT_EPSILON_SEC
): WordToken[] {
  return trimTimed(words, ownedBoundarySec, epsilonSec);
}

export function trimSegments(
  segments: readonly Segment[],
  ownedBoundarySec: number,
  epsilonSec = DEFAULT_EPSILON_SEC
): Segment[] {
  return trimTimed(segments, ownedBoundarySec, epsilonSec);
}
