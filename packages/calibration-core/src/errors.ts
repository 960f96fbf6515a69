// ---------------------------------------------------------------------------
// Error taxonomy
// ---------------------------------------------------------------------------

export type CalibrationErrorCode = 'INVALID_PARAMETER' | 'CALIBRATION_NON_CONVERGENCE';

/** Base class so callers can catch everything this package throws. */
export class CalibrationCoreError extends Error {
  constructor(
    public readonly code: CalibrationErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'CalibrationCoreError';
  }
}

/** A parameter failed validation. Raised at construction, never clamped. */
export class InvalidParameterError extends CalibrationCoreError {
  constructor(
    public readonly parameter: string,
    public readonly value: unknown,
    reason: string,
  ) {
    super('INVALID_PARAMETER', `Invalid ${parameter} (${String(value)}): ${reason}`);
    this.name = 'InvalidParameterError';
  }
}

/**
 * The gamma bisection could not reach the target coverage. The band that
 * would have been returned is only pointwise-valid, so it is withheld.
 */
export class CalibrationNonConvergenceError extends CalibrationCoreError {
  constructor(
    public readonly n: number,
    public readonly k: number,
    public readonly confidence: number,
    public readonly gamma: number,
    public readonly coverage: number,
    public readonly iterations: number,
  ) {
    super(
      'CALIBRATION_NON_CONVERGENCE',
      `Band calibration for n=${n}, k=${k} did not reach coverage ${confidence} ` +
        `(gamma=${gamma}, coverage=${coverage}, ${iterations} iterations)`,
    );
    this.name = 'CalibrationNonConvergenceError';
  }
}

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

export function assertFinite(parameter: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(parameter, value, 'must be a finite number');
  }
}

export function assertPositive(parameter: string, value: number): void {
  assertFinite(parameter, value);
  if (value <= 0) {
    throw new InvalidParameterError(parameter, value, 'must be positive');
  }
}

export function assertPositiveInteger(parameter: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidParameterError(parameter, value, 'must be a positive integer');
  }
}

export function assertProbability(parameter: string, value: number): void {
  assertFinite(parameter, value);
  if (value <= 0 || value >= 1) {
    throw new InvalidParameterError(parameter, value, 'must lie strictly between 0 and 1');
  }
}

export function assertNonEmptySample(sample: readonly number[]): void {
  if (sample.length === 0) {
    throw new InvalidParameterError('sample', '[]', 'must contain at least one value');
  }
  for (const x of sample) {
    if (!Number.isFinite(x)) {
      throw new InvalidParameterError('sample', x, 'values must be finite');
    }
  }
}
