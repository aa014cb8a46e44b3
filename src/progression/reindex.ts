export interface PointerAnchor {
  index: number;
  anchorId: string | null;
}

export interface ResolvedPointer extends PointerAnchor {
  /** False when the anchored entry is gone and the index was clamped instead. */
  matched: boolean;
}

/**
 * Re-derives a positional pointer from its identity anchor after the list
 * (already ordered by position) may have been edited. `base` is 1 for plan
 * days and 0 for cycle items.
 *
 * An empty list leaves the pointer untouched.
 */
export function resolvePointer<T extends { id: string }>(
  pointer: PointerAnchor,
  entries: readonly T[],
  base: 0 | 1,
): ResolvedPointer {
  if (entries.length === 0) {
    return { ...pointer, matched: false };
  }
  if (pointer.anchorId != null) {
    const found = entries.findIndex((e) => e.id === pointer.anchorId);
    if (found >= 0) {
      return { index: found + base, anchorId: pointer.anchorId, matched: true };
    }
  }
  const index = clampIndex(pointer.index, entries.length, base);
  return { index, anchorId: entries[index - base].id, matched: false };
}

export function clampIndex(index: number, total: number, base: 0 | 1): number {
  const last = total - 1 + base;
  return Math.max(base, Math.min(index, last));
}

/** Identity of the entry a pointer currently resolves to, if any. */
export function anchorAt<T extends { id: string }>(entries: readonly T[], index: number, base: 0 | 1): string | null {
  return entries[index - base]?.id ?? null;
}

/**
 * Sorts by position and rewrites positions to be consecutive from `base`.
 * Equal positions keep a stable order by identity.
 */
export function densePositions<T extends { id: string }>(
  entries: readonly T[],
  positionOf: (entry: T) => number,
  base: 0 | 1,
): Array<{ entry: T; position: number }> {
  return [...entries]
    .sort((a, b) => positionOf(a) - positionOf(b) || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
    .map((entry, i) => ({ entry, position: i + base }));
}
