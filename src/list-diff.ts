export type ListDiff<T> =
  | { kind: "append"; items: T[] }
  | { kind: "insert"; index: number; items: T[] }
  | { kind: "remove"; ids: string[] }
  | { kind: "reset"; items: T[] };

/**
 * Applies a patch the way a list widget would. Returns a new array; the input
 * is left untouched.
 */
export function applyListDiff<T>(list: readonly T[], diff: ListDiff<T>, idOf: (item: T) => string): T[] {
  switch (diff.kind) {
    case "append":
      return [...list, ...diff.items];
    case "insert": {
      const index = Math.max(0, Math.min(diff.index, list.length));
      return [...list.slice(0, index), ...diff.items, ...list.slice(index)];
    }
    case "remove": {
      const ids = new Set(diff.ids);
      return list.filter((item) => !ids.has(idOf(item)));
    }
    case "reset":
      return [...diff.items];
  }
}
