/**
 * Validation utilities for the flow simulation API boundary.
 * Run-time routing never throws; these helpers guard values handed to the
 * engine by callers (options, role configuration, control calls).
 *
 * @example
 * ```typescript
 * import { ValidationError } from 'flowgraph-sim';
 *
 * try {
 *   sim.setSpeed(0);
 * } catch (error) {
 *   if (error instanceof ValidationError) {
 *     console.log(error.message); // "speed must be positive (got 0). ..."
 *     console.log(error.context); // { speed: 0 }
 *   }
 * }
 * ```
 */

/**
 * Validation error class with context information.
 * Extends Error with an optional context object for debugging.
 */
export class ValidationError extends Error {
  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

function withContext(base: string, context?: string): string {
  return context ? `${base}. ${context}` : base;
}

/**
 * Validate that a number is non-negative (>= 0).
 *
 * @throws {ValidationError} If value < 0
 */
export function validateNonNegative(
  value: number,
  paramName: string,
  context?: string
): void {
  if (value < 0) {
    throw new ValidationError(
      withContext(`${paramName} must be non-negative (got ${value})`, context),
      { [paramName]: value }
    );
  }
}

/**
 * Validate that a number is positive (> 0).
 *
 * @throws {ValidationError} If value <= 0 or NaN
 */
export function validatePositive(
  value: number,
  paramName: string,
  context?: string
): void {
  if (!(value > 0)) {
    throw new ValidationError(
      withContext(`${paramName} must be positive (got ${value})`, context),
      { [paramName]: value }
    );
  }
}

/**
 * Validate that a number is finite (not NaN or Infinity).
 *
 * @throws {ValidationError} If value is NaN, Infinity, or -Infinity
 */
export function validateFinite(
  value: number,
  paramName: string,
  context?: string
): void {
  if (!Number.isFinite(value)) {
    throw new ValidationError(
      withContext(`${paramName} must be a finite number (got ${value})`, context),
      { [paramName]: value }
    );
  }
}

/**
 * Validate that a value is a whole number.
 *
 * @throws {ValidationError} If value has a fractional part
 */
export function validateInteger(
  value: number,
  paramName: string,
  context?: string
): void {
  if (!Number.isInteger(value)) {
    throw new ValidationError(
      withContext(`${paramName} must be an integer (got ${value})`, context),
      { [paramName]: value }
    );
  }
}

/**
 * Validate a count-like value: finite, whole and at least `minimum`.
 *
 * @example
 * ```typescript
 * validateCount(3, 'batchSize', 1); // OK
 * validateCount(0, 'batchSize', 1); // Throws: batchSize must be at least 1
 * ```
 */
export function validateCount(
  value: number,
  paramName: string,
  minimum: number = 0
): void {
  validateFinite(value, paramName);
  validateInteger(value, paramName);
  if (value < minimum) {
    throw new ValidationError(
      `${paramName} must be at least ${minimum} (got ${value})`,
      { [paramName]: value, minimum }
    );
  }
}

/**
 * Validate a simulation time value.
 * Ensures time is finite and non-negative.
 *
 * @param allowInfinity - Accept +Infinity as "never" (used for stop times)
 */
export function validateTime(
  time: number,
  paramName: string = 'time',
  allowInfinity: boolean = false
): void {
  if (!(allowInfinity && time === Infinity)) {
    validateFinite(time, paramName, 'Simulation time must be a valid number');
  }
  validateNonNegative(time, paramName, 'Simulation time cannot be negative');
}
