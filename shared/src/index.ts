// Domain models
export type {
  IsoDate,
  Airport,
  Aircraft,
  TripRequest,
  PartialTripRequest,
  PricingBreakdown,
  FlightLeg,
  AircraftOption,
  QuoteResponse
} from './models/charter.model';
export { isRoundTrip } from './models/charter.model';

// Contracts
export type { ApiResponse, ErrorBody, ErrorResponse, HealthCheck } from './contracts/common';
export { ErrorCodes, generateTraceId } from './contracts/common';
export type {
  QuoteResponseBody,
  ItineraryBody,
  PricingBreakdownBody,
  FlightLegBody,
  AircraftOptionBody,
  RecommendedAircraftBody,
  ConversationRole,
  ConversationTurn,
  ChatResponseBody,
  ChatQuoteReply,
  ChatIncompleteReply,
  ChatClarificationReply,
  ChatErrorReply,
  ExtractionSource,
  RequiredTripField,
  PartialTripRequestBody,
  StatusResponseBody
} from './contracts/quote';

// Data
export { CHARTER_AIRPORTS, CITY_ALIASES } from './data/charter-airports';
export { AIRCRAFT_TYPES } from './data/aircraft-types';

// Validators and errors
export {
  ValidationError,
  InvalidRouteError,
  NoAircraftAvailableError,
  isIsoDate,
  isNonEmptyString,
  isPositiveInteger
} from './validators/common';
export type { ValidationResult } from './validators/quote.validator';
export { validateQuoteRequest, parseQuoteRequest } from './validators/quote.validator';

// Catalogs, pricing and quoting
export type { AirportMatch, AirportMatchField } from './lib/airports';
export { AirportCatalog, createDefaultAirportCatalog } from './lib/airports';
export { AircraftCatalog, createDefaultAircraftCatalog, canAccommodate } from './lib/aircraft';
export type { LeadTimeTier, PricingSchedule } from './lib/pricing';
export { PricingEngine, DEFAULT_PRICING_SCHEDULE } from './lib/pricing';
export { QuoteBuilder } from './lib/quote-builder';
export { Money, roundTo, roundCurrency } from './lib/money';
export type { Clock } from './lib/dates';
export {
  todayIso,
  formatIsoDate,
  addDays,
  daysBetween,
  dayOfWeek,
  isWeekend,
  nextWeekday
} from './lib/dates';
export {
  encodePricingBreakdown,
  encodeFlightLeg,
  encodeAircraftOption,
  encodeRecommendedAircraft,
  encodeQuoteResponse,
  encodePartialTripRequest
} from './lib/serializers';
