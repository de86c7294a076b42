import {
  InvalidRouteError,
  NoAircraftAvailableError,
  ValidationError,
  isIsoDate,
  isNonEmptyString,
  isPositiveInteger
} from './common';
import { parseQuoteRequest, validateQuoteRequest } from './quote.validator';

const validBody = {
  origin: 'JFK',
  destination: 'LAX',
  departure_date: '2026-03-16',
  passengers: 4
};

describe('Validation Tests', () => {
  describe('isIsoDate', () => {
    it('should accept real calendar dates', () => {
      expect(isIsoDate('2026-03-16')).toBe(true);
      expect(isIsoDate('2028-02-29')).toBe(true); // leap year
    });

    it('should reject impossible or malformed dates', () => {
      expect(isIsoDate('2026-02-30')).toBe(false);
      expect(isIsoDate('2027-02-29')).toBe(false);
      expect(isIsoDate('2026-13-01')).toBe(false);
      expect(isIsoDate('03/16/2026')).toBe(false);
      expect(isIsoDate('2026-3-16')).toBe(false);
      expect(isIsoDate(20260316)).toBe(false);
    });
  });

  describe('isPositiveInteger', () => {
    it('should accept whole numbers from 1', () => {
      expect(isPositiveInteger(1)).toBe(true);
      expect(isPositiveInteger(16)).toBe(true);
    });

    it('should reject zero, negatives, fractions and strings', () => {
      expect(isPositiveInteger(0)).toBe(false);
      expect(isPositiveInteger(-2)).toBe(false);
      expect(isPositiveInteger(2.5)).toBe(false);
      expect(isPositiveInteger('4')).toBe(false);
    });
  });

  describe('isNonEmptyString', () => {
    it('should reject blank strings', () => {
      expect(isNonEmptyString('JFK')).toBe(true);
      expect(isNonEmptyString('   ')).toBe(false);
      expect(isNonEmptyString(undefined)).toBe(false);
    });
  });

  describe('validateQuoteRequest', () => {
    it('should accept a one-way request', () => {
      const result = validateQuoteRequest(validBody);

      expect(result.isValid).toBe(true);
      expect(result.value).toEqual({
        origin: 'JFK',
        destination: 'LAX',
        departureDate: '2026-03-16',
        returnDate: undefined,
        passengers: 4
      });
    });

    it('should trim airport tokens and accept a numeric passenger string', () => {
      const result = validateQuoteRequest({ ...validBody, origin: '  la ', passengers: '6' });

      expect(result.value?.origin).toBe('la');
      expect(result.value?.passengers).toBe(6);
    });

    it('should treat an empty or null return_date as one-way', () => {
      expect(validateQuoteRequest({ ...validBody, return_date: '' }).value?.returnDate).toBeUndefined();
      expect(validateQuoteRequest({ ...validBody, return_date: null }).value?.returnDate).toBeUndefined();
    });

    it('should accept a same-day return', () => {
      const result = validateQuoteRequest({ ...validBody, return_date: '2026-03-16' });
      expect(result.value?.returnDate).toBe('2026-03-16');
    });

    it('should reject a return before departure', () => {
      const result = validateQuoteRequest({ ...validBody, return_date: '2026-03-15' });

      expect(result.isValid).toBe(false);
      expect(result.errors).toEqual({ return_date: 'return_date must not be before departure_date' });
    });

    it('should report every missing field', () => {
      const result = validateQuoteRequest({});

      expect(result.isValid).toBe(false);
      expect(result.errors).toEqual({
        origin: 'origin is required',
        destination: 'destination is required',
        departure_date: 'departure_date is required',
        passengers: 'passengers is required'
      });
    });

    it('should reject malformed dates and passenger counts', () => {
      const result = validateQuoteRequest({ ...validBody, departure_date: '2026-02-30', passengers: 0 });

      expect(result.errors).toEqual({
        departure_date: 'departure_date must be a valid date in YYYY-MM-DD format',
        passengers: 'passengers must be a positive integer'
      });
    });

    it('should reject a body that is not an object', () => {
      expect(validateQuoteRequest(['JFK']).errors).toEqual({ body: 'Request body must be a JSON object' });
      expect(validateQuoteRequest(null).isValid).toBe(false);
    });
  });

  describe('parseQuoteRequest', () => {
    it('should throw a ValidationError naming the first offending field', () => {
      expect.assertions(3);
      try {
        parseQuoteRequest({ ...validBody, destination: '', passengers: -1 });
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.field).toBe('destination');
          expect(error.message).toBe('destination is required');
        }
      }
    });

    it('should return the trip request when valid', () => {
      expect(parseQuoteRequest(validBody).destination).toBe('LAX');
    });
  });

  describe('errors', () => {
    it('should name the unresolved airport', () => {
      const error = new InvalidRouteError('destination', 'bo');

      expect(error).toBeInstanceOf(ValidationError);
      expect(error.field).toBe('destination');
      expect(error.message).toBe('Unknown destination airport: bo');
    });

    it('should carry the party size and largest capacity', () => {
      const error = new NoAircraftAvailableError(20, 16);

      expect(error.passengers).toBe(20);
      expect(error.maxCapacity).toBe(16);
      expect(error.message).toBe('No aircraft can carry 20 passengers (largest capacity is 16)');
    });
  });
});
