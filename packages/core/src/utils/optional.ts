/**
 * Builds objects whose optional keys are absent rather than `undefined`,
 * as `exactOptionalPropertyTypes` requires.
 *
 * @example
 * ```typescript
 * const request = setOptional<ResolvedRequest>({ method, url, headers })
 *   .ifDefined('body', body)
 *   .build();
 * ```
 */
export interface OptionalBuilder<T extends object> {
  /** Set `key` unless `value` is undefined. */
  ifDefined<K extends keyof T>(key: K, value: T[K] | undefined): OptionalBuilder<T>;

  build(): T;
}

export function setOptional<T extends object>(base: T): OptionalBuilder<T> {
  const result: T = { ...base };

  const builder: OptionalBuilder<T> = {
    ifDefined(key, value) {
      if (value !== undefined) {
        result[key] = value;
      }
      return builder;
    },

    build() {
      return { ...result };
    }
  };

  return builder;
}
