import { TripRequest } from '../models/charter.model';
import { isIsoDate, isNonEmptyString, isPositiveInteger, ValidationError } from './common';

export interface ValidationResult<T> {
  isValid: boolean;
  errors: Record<string, string>;
  value?: T;
}

const PASSENGER_COUNT_REGEX = /^\d+$/;

/** Form fields often carry counts as strings; accept "4" as well as 4. */
function coercePassengers(value: unknown): unknown {
  if (typeof value === 'string' && PASSENGER_COUNT_REGEX.test(value.trim())) {
    return Number(value.trim());
  }
  return value;
}

const isAbsent = (value: unknown) => value === undefined || value === null || value === '';

export function validateQuoteRequest(body: unknown): ValidationResult<TripRequest> {
  const errors: Record<string, string> = {};

  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    errors.body = 'Request body must be a JSON object';
    return { isValid: false, errors };
  }

  const params: Record<string, unknown> = { ...body };

  if (!isNonEmptyString(params.origin)) {
    errors.origin = 'origin is required';
  }

  if (!isNonEmptyString(params.destination)) {
    errors.destination = 'destination is required';
  }

  if (isAbsent(params.departure_date)) {
    errors.departure_date = 'departure_date is required';
  } else if (!isIsoDate(params.departure_date)) {
    errors.departure_date = 'departure_date must be a valid date in YYYY-MM-DD format';
  }

  if (!isAbsent(params.return_date)) {
    if (!isIsoDate(params.return_date)) {
      errors.return_date = 'return_date must be a valid date in YYYY-MM-DD format';
    } else if (isIsoDate(params.departure_date) && params.return_date < params.departure_date) {
      errors.return_date = 'return_date must not be before departure_date';
    }
  }

  const passengers = coercePassengers(params.passengers);
  if (isAbsent(passengers)) {
    errors.passengers = 'passengers is required';
  } else if (!isPositiveInteger(passengers)) {
    errors.passengers = 'passengers must be a positive integer';
  }

  if (
    Object.keys(errors).length > 0 ||
    !isNonEmptyString(params.origin) ||
    !isNonEmptyString(params.destination) ||
    !isIsoDate(params.departure_date) ||
    !isPositiveInteger(passengers)
  ) {
    return { isValid: false, errors };
  }

  return {
    isValid: true,
    errors,
    value: {
      origin: params.origin.trim(),
      destination: params.destination.trim(),
      departureDate: params.departure_date,
      returnDate: isIsoDate(params.return_date) ? params.return_date : undefined,
      passengers
    }
  };
}

/**
 * Same checks as validateQuoteRequest, throwing on the first offending field.
 */
export function parseQuoteRequest(body: unknown): TripRequest {
  const result = validateQuoteRequest(body);
  if (result.value) {
    return result.value;
  }

  const [field, message] = Object.entries(result.errors)[0] ?? ['body', 'Invalid request'];
  throw new ValidationError(message, field);
}
