/**
 * Base class for every error raised by query evaluation and the cache layer.
 */
export class QuarryError extends Error {
  override readonly name: string = 'QuarryError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnknownLookupError extends QuarryError {
  override readonly name = 'UnknownLookupError';

  constructor(readonly lookup: string, known: readonly string[] = []) {
    super(
      known.length > 0
        ? `Unknown lookup "${lookup}". Must be one of: ${known.join(', ')}`
        : `Unknown lookup "${lookup}"`,
    );
  }
}

export class InvalidOperandError extends QuarryError {
  override readonly name = 'InvalidOperandError';

  constructor(
    readonly lookup: string,
    readonly operand: unknown,
    message?: string,
  ) {
    super(message ?? `Invalid operand for "${lookup}": ${describeValue(operand)}`);
  }
}

export class TypeMismatchError extends QuarryError {
  override readonly name = 'TypeMismatchError';

  constructor(
    readonly lookup: string,
    readonly left: unknown,
    readonly right: unknown,
  ) {
    super(
      `Cannot compare ${describeValue(left)} with ${describeValue(right)} using "${lookup}"`,
    );
  }
}

export class DoesNotExistError extends QuarryError {
  override readonly name = 'DoesNotExistError';

  constructor(readonly label: string) {
    super(`${label} matching query does not exist.`);
  }
}

export class MultipleObjectsReturnedError extends QuarryError {
  override readonly name = 'MultipleObjectsReturnedError';

  constructor(
    readonly label: string,
    readonly count: number,
  ) {
    super(`get() returned more than one ${label} -- it returned ${count}!`);
  }
}

export class SourceFetchError extends QuarryError {
  override readonly name = 'SourceFetchError';

  constructor(
    readonly key: string,
    override readonly cause: unknown,
    message?: string,
  ) {
    super(message ?? `Fetching "${key}" failed: ${errorMessage(cause)}`, { cause });
  }
}

// Utilities
// ==============================

/**
 * Short type-tagged rendering of a value for error messages.
 * @internal
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (value instanceof Date) return `Date(${value.toISOString()})`;
  if (Array.isArray(value)) return `array(${value.length})`;
  if (typeof value === 'string') return `string "${value}"`;
  if (typeof value === 'object') return 'object';
  return `${typeof value} ${String(value)}`;
}

/**
 * @internal
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
