/**
 * List shared between the event handlers (writers) and the loops (readers).
 * Readers get a copy; writers swap in a new array, so a reader never sees
 * a half-applied change.
 */
export class SharedList<T> {
  private items: readonly T[];

  constructor(initial: readonly T[] = []) {
    this.items = [...initial];
  }

  get length(): number {
    return this.items.length;
  }

  snapshot(): T[] {
    return [...this.items];
  }

  update(mutate: (draft: T[]) => void): void {
    const draft = [...this.items];
    mutate(draft);
    this.items = draft;
  }

  /**
   * Replace the first item matching `predicate`, or append.
   */
  upsert(predicate: (item: T) => boolean, item: T): 'updated' | 'appended' {
    let outcome: 'updated' | 'appended' = 'appended';
    this.update(draft => {
      const index = draft.findIndex(predicate);
      if (index >= 0) {
        draft[index] = item;
        outcome = 'updated';
      } else {
        draft.push(item);
      }
    });
    return outcome;
  }

  remove(predicate: (item: T) => boolean): number {
    let removed = 0;
    this.update(draft => {
      for (let i = draft.length - 1; i >= 0; i--) {
        if (predicate(draft[i])) {
          draft.splice(i, 1);
          removed++;
        }
      }
    });
    return removed;
  }
}
