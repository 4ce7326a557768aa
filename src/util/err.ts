const symErr = Symbol("err");

export type Err<T> = {[symErr]: true; error: T};

export type Result<T, E> = T | Err<E>;

// eslint-disable-next-line @typescript-eslint/naming-convention
export function Err<T>(error: T): Err<T> {
  return {[symErr]: true, error};
}

/**
 * Typeguard for Err<T>. Allows the pattern
 * ```ts
 * function getHeight(): Result<number, Error> {
 *   const value = parseField();
 *   if (isErr(value)) {
 *     return value; // return as error
 *   }
 *   return value + 1;
 * }
 * ```
 * Since the non-error is not wrapped, it uses a symbol to prevent collisions
 */
export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result !== null && typeof result === "object" && symErr in result;
}
