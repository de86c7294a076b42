/**
 * Errors and shared checks used across the quote pipeline
 */

export class ValidationError extends Error {
  constructor(message: string, public field: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Raised when an origin or destination token matches no known airport.
 */
export class InvalidRouteError extends ValidationError {
  constructor(public field: 'origin' | 'destination', public token: string) {
    super(`Unknown ${field} airport: ${token}`, field);
    this.name = 'InvalidRouteError';
  }
}

export class NoAircraftAvailableError extends Error {
  constructor(public passengers: number, public maxCapacity: number) {
    super(`No aircraft can carry ${passengers} passengers (largest capacity is ${maxCapacity})`);
    this.name = 'NoAircraftAvailableError';
  }
}

const ISO_DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * True for a real calendar date written as YYYY-MM-DD (2026-02-30 is rejected).
 */
export function isIsoDate(value: unknown): value is string {
  if (typeof value !== 'string') return false;
  const match = ISO_DATE_REGEX.exec(value);
  if (!match) return false;

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  return (
    date.getUTCFullYear() === Number(year) &&
    date.getUTCMonth() === Number(month) - 1 &&
    date.getUTCDate() === Number(day)
  );
}

export function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1;
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}
