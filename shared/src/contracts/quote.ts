/**
 * Wire contracts for the quote, chat and status endpoints.
 * Field names follow the public JSON shape (snake_case).
 */

export interface ItineraryBody {
  origin: string;
  destination: string;
  departure_date: string;
  return_date: string | null;
  passengers: number;
  distance_nm: number;
}

export interface PricingBreakdownBody {
  billable_nm: number;
  base_nm_rate: number;
  base_cost: number;
  fees: {
    landing_fee: number;
    segment_fee: number;
  };
  multipliers: {
    lead_time: number;
    weekend: number;
  };
  subtotal: number;
  taxes: number;
  total_usd: number;
}

export interface FlightLegBody {
  from: string;
  to: string;
  distance_nm: number;
  pricing: PricingBreakdownBody;
}

export interface AircraftOptionBody {
  aircraft_type: string;
  capacity: number;
  base_nm_rate: number;
  range_nm: number;
  cruise_speed: number;
  amenities: string;
  total_price_usd: number;
  outbound_leg: FlightLegBody;
  return_leg: FlightLegBody | null;
  recommended: boolean;
}

export interface RecommendedAircraftBody {
  type: string;
  capacity: number;
  total_price_usd: number;
  base_nm_rate: number;
  range_nm: number;
  cruise_speed: number;
  amenities: string;
}

export interface QuoteResponseBody {
  itinerary: ItineraryBody;
  aircraft_options: AircraftOptionBody[];
  recommended_aircraft: RecommendedAircraftBody;
  currency: 'USD';
  total_price_usd: number;
}

// Chat

export type ConversationRole = 'user' | 'assistant' | 'system';

export interface ConversationTurn {
  role: ConversationRole;
  content: string;
}

export type ExtractionSource = 'language_model' | 'heuristic';

export type RequiredTripField = 'origin' | 'destination' | 'departure_date' | 'passengers';

export interface PartialTripRequestBody {
  origin: string | null;
  destination: string | null;
  departure_date: string | null;
  return_date: string | null;
  passengers: number | null;
}

export interface ChatQuoteReply extends QuoteResponseBody {
  reply: string;
  legs: FlightLegBody[];
  source: ExtractionSource;
}

export interface ChatIncompleteReply {
  reply: string;
  missing_details: RequiredTripField[];
  partial_request: PartialTripRequestBody;
  source: ExtractionSource;
}

export interface ChatClarificationReply {
  reply: string;
  required_fields: RequiredTripField[];
}

export interface ChatErrorReply {
  reply: string;
  error: {
    code: string;
    message: string;
    field?: string;
  };
  partial_request: PartialTripRequestBody;
  source: ExtractionSource;
}

export type ChatResponseBody =
  | ChatQuoteReply
  | ChatIncompleteReply
  | ChatClarificationReply
  | ChatErrorReply;

// Status

export interface StatusResponseBody {
  status: 'ok';
  extraction_service_available: boolean;
  extraction_model: string | null;
  airports_count: number;
  aircraft_types: number;
}
