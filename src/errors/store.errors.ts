export enum StoreErrorKind {
  UNINITIALIZED = 'uninitialized',
  TRANSIENT = 'transient',
  DECODE = 'decode',
}

export enum FailureAction {
  /** Give up and hand the caller its default value */
  RETURN_DEFAULT = 'return_default',
  /** One fallback attempt: add-if-absent for writes, per-key gets for reads */
  RETRY_ONCE = 'retry_once',
  /** Drop the offending value and keep aggregating */
  SKIP = 'skip',
}

export const FAILURE_POLICY: Readonly<Record<StoreErrorKind, FailureAction>> =
  {
    [StoreErrorKind.UNINITIALIZED]: FailureAction.RETURN_DEFAULT,
    [StoreErrorKind.TRANSIENT]: FailureAction.RETRY_ONCE,
    [StoreErrorKind.DECODE]: FailureAction.SKIP,
  };

export abstract class StoreError extends Error {
  abstract readonly kind: StoreErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class StoreUninitializedError extends StoreError {
  readonly kind = StoreErrorKind.UNINITIALIZED;

  constructor(storeName: string) {
    super(`${storeName} has not been initialized`);
  }
}

export class TransientStoreError extends StoreError {
  readonly kind = StoreErrorKind.TRANSIENT;
}

export class DecodeError extends StoreError {
  readonly kind = StoreErrorKind.DECODE;

  constructor(
    readonly key: string,
    readonly raw: unknown,
    expected: string,
  ) {
    super(`Value for ${key} is not a valid ${expected}: ${String(raw)}`);
  }
}

/**
 * Maps anything a store call may throw onto an error kind. Errors coming from
 * client libraries (connection resets, timeouts, server replies) are transient.
 */
export function classifyStoreError(error: unknown): StoreErrorKind {
  if (error instanceof StoreError) {
    return error.kind;
  }
  return StoreErrorKind.TRANSIENT;
}

export function failureActionFor(error: unknown): FailureAction {
  return FAILURE_POLICY[classifyStoreError(error)];
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs a client call and rethrows client errors as a TransientStoreError,
 * keeping the original as its cause. StoreErrors pass through unchanged.
 */
export async function wrapStoreCall<T>(
  operation: string,
  call: () => Promise<T>,
): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof StoreError) {
      throw error;
    }
    throw new TransientStoreError(`${operation} failed: ${describeError(error)}`, {
      cause: error,
    });
  }
}
