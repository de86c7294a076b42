import {
  AircraftOptionBody,
  FlightLegBody,
  PartialTripRequestBody,
  PricingBreakdownBody,
  QuoteResponseBody,
  RecommendedAircraftBody
} from '../contracts/quote';
import { AircraftOption, FlightLeg, PartialTripRequest, PricingBreakdown, QuoteResponse } from '../models/charter.model';
import { roundCurrency, roundTo } from './money';

const roundDistance = (distanceNm: number) => Math.round(distanceNm * 10) / 10;

export function encodePricingBreakdown(pricing: PricingBreakdown): PricingBreakdownBody {
  return {
    billable_nm: roundDistance(pricing.billableNm),
    base_nm_rate: pricing.baseNmRate.toNumber(),
    base_cost: roundCurrency(pricing.baseCost),
    fees: {
      landing_fee: pricing.landingFee.toNumber(),
      segment_fee: pricing.segmentFee.toNumber()
    },
    multipliers: {
      lead_time: roundTo(pricing.leadTimeMultiplier, 2),
      weekend: roundTo(pricing.weekendMultiplier, 2)
    },
    subtotal: roundCurrency(pricing.subtotal),
    taxes: roundCurrency(pricing.taxes),
    total_usd: roundCurrency(pricing.totalUsd)
  };
}

export function encodeFlightLeg(leg: FlightLeg): FlightLegBody {
  return {
    from: leg.origin,
    to: leg.destination,
    distance_nm: roundDistance(leg.distanceNm),
    pricing: encodePricingBreakdown(leg.pricing)
  };
}

export function encodeAircraftOption(option: AircraftOption): AircraftOptionBody {
  const { aircraft } = option;
  return {
    aircraft_type: aircraft.type,
    capacity: aircraft.capacity,
    base_nm_rate: aircraft.baseNmRate.toNumber(),
    range_nm: aircraft.rangeNm,
    cruise_speed: aircraft.cruiseSpeedKts,
    amenities: aircraft.amenities,
    total_price_usd: roundCurrency(option.totalPriceUsd),
    outbound_leg: encodeFlightLeg(option.outboundLeg),
    return_leg: option.returnLeg ? encodeFlightLeg(option.returnLeg) : null,
    recommended: option.isRecommended
  };
}

export function encodeRecommendedAircraft(option: AircraftOption): RecommendedAircraftBody {
  const { aircraft } = option;
  return {
    type: aircraft.type,
    capacity: aircraft.capacity,
    total_price_usd: roundCurrency(option.totalPriceUsd),
    base_nm_rate: aircraft.baseNmRate.toNumber(),
    range_nm: aircraft.rangeNm,
    cruise_speed: aircraft.cruiseSpeedKts,
    amenities: aircraft.amenities
  };
}

export function encodeQuoteResponse(quote: QuoteResponse): QuoteResponseBody {
  const { tripRequest } = quote;
  return {
    itinerary: {
      origin: tripRequest.origin,
      destination: tripRequest.destination,
      departure_date: tripRequest.departureDate,
      return_date: tripRequest.returnDate ?? null,
      passengers: tripRequest.passengers,
      distance_nm: roundDistance(quote.distanceNm)
    },
    aircraft_options: quote.aircraftOptions.map(encodeAircraftOption),
    recommended_aircraft: encodeRecommendedAircraft(quote.recommendedOption),
    currency: 'USD',
    total_price_usd: roundCurrency(quote.recommendedOption.totalPriceUsd)
  };
}

export function encodePartialTripRequest(request: PartialTripRequest): PartialTripRequestBody {
  return {
    origin: request.origin ?? null,
    destination: request.destination ?? null,
    departure_date: request.departureDate ?? null,
    return_date: request.returnDate ?? null,
    passengers: request.passengers ?? null
  };
}
