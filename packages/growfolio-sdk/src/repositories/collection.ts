interface Identified {
  readonly id: string;
}

/**
 * Replaces the item with the same id in place, or adds it.
 */
export const upsertById = <T extends Identified>(
  items: readonly T[],
  item: T,
  position: 'start' | 'end' = 'end'
): T[] => {
  if (items.some((existing) => existing.id === item.id)) {
    return items.map((existing) => (existing.id === item.id ? item : existing));
  }
  return position === 'start' ? [item, ...items] : [...items, item];
};

export const removeById = <T extends Identified>(items: readonly T[], id: string): T[] =>
  items.filter((item) => item.id !== id);

export const findById = <T extends Identified>(
  items: readonly T[] | undefined,
  id: string
): T | undefined => items?.find((item) => item.id === id);
