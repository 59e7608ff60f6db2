export type LazyValue<T> = {
  get(): T;
  /** Drops the cached value; the next `get` runs `create` again. */
  reset(): void;
};

export function createLazyValue<T>(create: () => T): LazyValue<T> {
  type State = { type: 'empty' } | { type: 'filled'; value: T };
  let state: State = { type: 'empty' };

  return {
    get: () => {
      if (state.type === 'filled') {
        return state.value;
      }

      const value = create();
      state = { type: 'filled', value };
      return value;
    },
    reset: () => {
      state = { type: 'empty' };
    },
  };
}
