export const DEFAULT_SUGGESTION_MAX_DISTANCE = 3;

/** Levenshtein distance with unit insert, delete and substitute costs. */
export function editDistance(source: string, target: string): number {
  if (source === target) {
    return 0;
  }
  if (source.length === 0 || target.length === 0) {
    return source.length + target.length;
  }

  // Row i holds the distances from source[0..i) to every prefix of target
  let previousRow = Array.from({ length: target.length + 1 }, (_, column) => column);
  for (let row = 1; row <= source.length; row += 1) {
    const currentRow = [row];
    for (let column = 1; column <= target.length; column += 1) {
      const substitutionCost = source[row - 1] === target[column - 1] ? 0 : 1;
      const deletion = (previousRow[column] ?? 0) + 1;
      const insertion = (currentRow[column - 1] ?? 0) + 1;
      const substitution = (previousRow[column - 1] ?? 0) + substitutionCost;
      currentRow.push(Math.min(deletion, insertion, substitution));
    }
    previousRow = currentRow;
  }
  return previousRow[target.length] ?? 0;
}

/**
 * Closest known command name to `input`, compared case-insensitively.
 * Returns undefined when nothing is within `maxDistance`. On ties the first
 * candidate wins.
 */
export function findClosestCommand(
  input: string,
  candidates: Iterable<string>,
  maxDistance = DEFAULT_SUGGESTION_MAX_DISTANCE,
): string | undefined {
  const needle = input.toLowerCase();
  let closest: string | undefined;
  let minDistance = Number.POSITIVE_INFINITY;

  for (const candidate of candidates) {
    const distance = editDistance(needle, candidate.toLowerCase());
    if (distance < minDistance && distance <= maxDistance) {
      minDistance = distance;
      closest = candidate;
    }
  }
  return closest;
}
