type ResultState<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/**
 * Success-or-error value for the configuration, seed and command-line
 * plumbing. Level generation itself is total and never produces an `Err`.
 *
 * @example
 * ```typescript
 * const config = readFile(path)
 *   .flatMap((raw) => buildLevelGenConfig(JSON.parse(raw)))
 *   .mapErr((error) => new LevelGenError(error.code, `${path}: ${error.message}`))
 *   .getOrThrow();
 * ```
 */
export class Result<T, E> {
  private constructor(private readonly state: ResultState<T, E>) {}

  static ok<T, E = never>(value: T): Result<T, E> {
    return new Result<T, E>({ ok: true, value });
  }

  static err<T = never, E = unknown>(error: E): Result<T, E> {
    return new Result<T, E>({ ok: false, error });
  }

  /**
   * Run `fn`, turning anything it throws into an `Err` through `onError`.
   */
  static fromThrowable<T, E>(
    fn: () => T,
    onError: (thrown: unknown) => E,
  ): Result<T, E> {
    try {
      return Result.ok<T, E>(fn());
    } catch (thrown) {
      return Result.err<T, E>(onError(thrown));
    }
  }

  isOk(): boolean {
    return this.state.ok;
  }

  isErr(): boolean {
    return !this.state.ok;
  }

  get success(): boolean {
    return this.state.ok;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    return this.state.ok
      ? Result.ok<U, E>(fn(this.state.value))
      : Result.err<U, E>(this.state.error);
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    return this.state.ok
      ? Result.ok<T, F>(this.state.value)
      : Result.err<T, F>(fn(this.state.error));
  }

  flatMap<U>(fn: (value: T) => Result<U, E>): Result<U, E> {
    return this.state.ok
      ? fn(this.state.value)
      : Result.err<U, E>(this.state.error);
  }

  getOrThrow(): T {
    if (!this.state.ok) throw this.state.error;
    return this.state.value;
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
