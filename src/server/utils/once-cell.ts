/**
 * One-time asynchronous initialization.
 *
 * The first caller of `getOrInit` starts the initializer; every caller that
 * arrives while it runs, and every caller after it settles, receives the same
 * promise. A rejection is kept: the cell never runs its initializer twice.
 *
 * @example
 * ```typescript
 * const cell = new OnceCell<WordCache>();
 * const [a, b] = await Promise.all([
 *   cell.getOrInit(() => WordCache.load(store)),
 *   cell.getOrInit(() => WordCache.load(store)),
 * ]);
 * // a === b, store.scan() ran once
 * ```
 */

export type OnceCellState = 'empty' | 'pending' | 'fulfilled' | 'rejected';

export class OnceCell<T> {
  private promise: Promise<T> | null = null;
  private settled: 'fulfilled' | 'rejected' | null = null;

  getOrInit(init: () => Promise<T>): Promise<T> {
    if (!this.promise) {
      // Wrapped so a synchronous throw becomes the shared rejection too
      this.promise = Promise.resolve()
        .then(init)
        .then(
          value => {
            this.settled = 'fulfilled';
            return value;
          },
          (error: unknown) => {
            this.settled = 'rejected';
            throw error;
          }
        );
    }
    return this.promise;
  }

  get state(): OnceCellState {
    if (!this.promise) {
      return 'empty';
    }
    return this.settled ?? 'pending';
  }
}
