import type Decimal from 'decimal.js';

/** Calendar date in `YYYY-MM-DD` form. */
export type IsoDate = string;

export interface Airport {
  code: string; // IATA code
  city: string;
  latitude: number; // degrees
  longitude: number; // degrees
}

export interface Aircraft {
  type: string;
  capacity: number;
  baseNmRate: Decimal; // USD per nautical mile
  rangeNm: number;
  cruiseSpeedKts: number;
  amenities: string;
}

export interface TripRequest {
  origin: string; // raw token, resolved by the airport catalog
  destination: string;
  departureDate: IsoDate;
  returnDate?: IsoDate;
  passengers: number;
}

/**
 * Whatever a request interpreter managed to pull out of free text.
 * Every field may be missing.
 */
export type PartialTripRequest = Partial<TripRequest>;

export interface PricingBreakdown {
  billableNm: number;
  baseNmRate: Decimal;
  baseCost: Decimal;
  landingFee: Decimal;
  segmentFee: Decimal;
  leadTimeMultiplier: Decimal;
  weekendMultiplier: Decimal;
  subtotal: Decimal;
  taxes: Decimal;
  totalUsd: Decimal;
}

export interface FlightLeg {
  origin: string; // IATA code
  destination: string; // IATA code
  distanceNm: number;
  pricing: PricingBreakdown;
}

export interface AircraftOption {
  aircraft: Aircraft;
  outboundLeg: FlightLeg;
  returnLeg?: FlightLeg;
  totalPriceUsd: Decimal;
  isRecommended: boolean;
}

export interface QuoteResponse {
  tripRequest: TripRequest;
  distanceNm: number;
  aircraftOptions: AircraftOption[]; // ascending by total price
  recommendedOption: AircraftOption;
}

export function isRoundTrip(request: Pick<TripRequest, 'returnDate'>): boolean {
  return request.returnDate !== undefined;
}
