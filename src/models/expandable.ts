/**
 * A partial entity that can be upgraded into its full variant. Every `expand()` call
 * performs a fresh upgrade request; nothing is memoized.
 */
export abstract class Expandable<T> {
  abstract expand(): Promise<T>;
}

/** Yields each element, expanding the partial ones along the way. */
export async function* expandPartial<T>(items: Iterable<T | Expandable<T>>): AsyncGenerator<T> {
  for (const item of items) {
    if (item instanceof Expandable) {
      yield await item.expand();
    } else {
      yield item;
    }
  }
}
