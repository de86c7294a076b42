import {
  ChatClarificationReply,
  ChatErrorReply,
  ChatIncompleteReply,
  ChatQuoteReply,
  ChatResponseBody,
  ConversationTurn,
  ErrorCodes,
  ExtractionSource,
  FlightLeg,
  InvalidRouteError,
  NoAircraftAvailableError,
  PartialTripRequest,
  QuoteBuilder,
  QuoteResponse,
  RequiredTripField,
  ValidationError,
  encodeFlightLeg,
  encodePartialTripRequest,
  encodeQuoteResponse,
  isRoundTrip,
  parseQuoteRequest,
  roundTo
} from '@charterquote/shared';
import { HeuristicTripParser } from './heuristicParser';
import { TripExtractor } from './types';

export const REQUIRED_FIELDS: RequiredTripField[] = ['origin', 'destination', 'departure_date', 'passengers'];

const FIELD_LABELS: Record<RequiredTripField, string> = {
  origin: 'origin',
  destination: 'destination',
  departure_date: 'departure date',
  passengers: 'passenger count'
};

export const CLARIFICATION_PROMPT =
  'I can quote your charter once I know the origin, destination, departure date and passenger count. ' +
  "For example: 'New York to Miami on Friday for 6, return Monday'.";

function missingFields(request: PartialTripRequest): RequiredTripField[] {
  const present: Record<RequiredTripField, boolean> = {
    origin: Boolean(request.origin),
    destination: Boolean(request.destination),
    departure_date: Boolean(request.departureDate),
    passengers: request.passengers !== undefined
  };
  return REQUIRED_FIELDS.filter((field) => !present[field]);
}

const formatWholeDollars = (amount: QuoteResponse['recommendedOption']['totalPriceUsd']) =>
  roundTo(amount, 0).toLocaleString('en-US');

export function formatQuoteReply(quote: QuoteResponse, origin: string, destination: string): string {
  const { tripRequest, recommendedOption } = quote;
  const route = `from ${origin} to ${destination}${isRoundTrip(tripRequest) ? ' with return' : ''}`;
  return (
    `Charter: ${tripRequest.passengers} pax on ${recommendedOption.aircraft.type} ${route}. ` +
    `Total: $${formatWholeDollars(recommendedOption.totalPriceUsd)} USD.`
  );
}

/**
 * Chat front door: extracts a trip from the conversation, then either asks
 * for what is missing or returns a full quote.
 */
export class ChatService {
  constructor(
    private readonly builder: QuoteBuilder,
    private readonly extractor: TripExtractor,
    private readonly parser: HeuristicTripParser
  ) {}

  async handleMessage(message: string, history: ConversationTurn[] = []): Promise<ChatResponseBody> {
    const { request, source } = await this.interpret(message, history);

    const missing = missingFields(request);
    if (missing.length === REQUIRED_FIELDS.length) {
      const reply: ChatClarificationReply = { reply: CLARIFICATION_PROMPT, required_fields: REQUIRED_FIELDS };
      return reply;
    }

    if (missing.length > 0) {
      const reply: ChatIncompleteReply = {
        reply: `Missing: ${missing.map((field) => FIELD_LABELS[field]).join(', ')}.`,
        missing_details: missing,
        partial_request: encodePartialTripRequest(request),
        source
      };
      return reply;
    }

    return this.quote(request, source);
  }

  private async interpret(
    message: string,
    history: ConversationTurn[]
  ): Promise<{ request: PartialTripRequest; source: ExtractionSource }> {
    if (this.extractor.isAvailable()) {
      const result = await this.extractor.extract(message, history);
      if (result.status === 'extracted') {
        return { request: result.request, source: 'language_model' };
      }
    }
    return { request: this.parser.parseConversation(message, history), source: 'heuristic' };
  }

  private quote(request: PartialTripRequest, source: ExtractionSource): ChatResponseBody {
    const partial = encodePartialTripRequest(request);

    try {
      const tripRequest = parseQuoteRequest(partial);
      const quote = this.builder.build(tripRequest);
      const encoded = encodeQuoteResponse(quote);
      const recommended = quote.recommendedOption;

      const reply: ChatQuoteReply = {
        reply: formatQuoteReply(quote, recommended.outboundLeg.origin, recommended.outboundLeg.destination),
        ...encoded,
        legs: [recommended.outboundLeg, recommended.returnLeg]
          .filter((leg): leg is FlightLeg => leg !== undefined)
          .map(encodeFlightLeg),
        source
      };
      return reply;
    } catch (error) {
      if (error instanceof ValidationError) {
        const code = error instanceof InvalidRouteError ? ErrorCodes.INVALID_ROUTE : ErrorCodes.VALIDATION_ERROR;
        return this.errorReply(
          `I couldn't quote that trip: ${error.message}.`,
          { code, message: error.message, field: error.field },
          request,
          source
        );
      }
      if (error instanceof NoAircraftAvailableError) {
        return this.errorReply(
          `No single aircraft in our fleet seats ${error.passengers} passengers; the largest carries ${error.maxCapacity}.`,
          { code: ErrorCodes.NO_AIRCRAFT_AVAILABLE, message: error.message },
          request,
          source
        );
      }
      throw error;
    }
  }

  private errorReply(
    text: string,
    error: ChatErrorReply['error'],
    request: PartialTripRequest,
    source: ExtractionSource
  ): ChatErrorReply {
    return { reply: text, error, partial_request: encodePartialTripRequest(request), source };
  }
}
