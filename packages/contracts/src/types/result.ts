/**
 * A Result type for explicit, type-safe error handling.
 *
 * @example
 * ```typescript
 * const summary = parseMazeConfig(input)
 *   .flatMap((config) => generateMaze(config))
 *   .map((maze) => maze.checksum)
 *   .getOrElse("none");
 * ```
 */
type ResultState<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export class Result<T, E> {
  private constructor(private readonly state: ResultState<T, E>) {}

  static ok<T, E = never>(value: T): Result<T, E> {
    return new Result<T, E>({ ok: true, value });
  }

  static err<T = never, E = unknown>(error: E): Result<T, E> {
    return new Result<T, E>({ ok: false, error });
  }

  /**
   * Run `fn`, capturing a throw as an Err mapped through `onError`.
   */
  static fromThrowable<T, E>(fn: () => T, onError: (e: unknown) => E): Result<T, E> {
    try {
      return Result.ok(fn());
    } catch (e) {
      return Result.err(onError(e));
    }
  }

  isOk(): boolean {
    return this.state.ok;
  }

  isErr(): boolean {
    return !this.state.ok;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    return this.state.ok ? Result.ok(fn(this.state.value)) : Result.err(this.state.error);
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    return this.state.ok ? Result.ok(this.state.value) : Result.err(fn(this.state.error));
  }

  flatMap<U>(fn: (value: T) => Result<U, E>): Result<U, E> {
    return this.state.ok ? fn(this.state.value) : Result.err(this.state.error);
  }

  getOrElse(defaultValue: T): T {
    return this.state.ok ? this.state.value : defaultValue;
  }

  getOrThrow(): T {
    if (this.state.ok) {
      return this.state.value;
    }
    throw this.state.error;
  }

  match<U>(onOk: (value: T) => U, onErr: (error: E) => U): U {
    return this.state.ok ? onOk(this.state.value) : onErr(this.state.error);
  }

  get value(): T {
    if (!this.state.ok) {
      throw new Error("Cannot access value of Err Result");
    }
    return this.state.value;
  }

  get error(): E {
    if (this.state.ok) {
      throw new Error("Cannot access error of Ok Result");
    }
    return this.state.error;
  }
}

export const Ok = Result.ok;
export const Err = Result.err;
