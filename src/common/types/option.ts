export type Option<T> = { found: true; value: T } | { found: false };

export const some = <T>(value: T): Option<T> => ({ found: true, value });

export const none = <T = never>(): Option<T> => ({ found: false });

export function fromNullable<T>(value: T | null | undefined): Option<T> {
  return value === null || value === undefined ? none() : some(value);
}
