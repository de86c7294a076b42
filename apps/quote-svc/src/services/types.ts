import { ConversationTurn, PartialTripRequest } from '@charterquote/shared';

export type ExtractionResult =
  | { status: 'extracted'; request: PartialTripRequest }
  | { status: 'unavailable'; reason: string };

/**
 * Anything that can turn a chat message into a (possibly partial) trip.
 */
export interface TripExtractor {
  readonly model: string | null;
  isAvailable(): boolean;
  extract(message: string, history: ConversationTurn[]): Promise<ExtractionResult>;
}

/** Turns of conversation history forwarded to an extractor. */
export const HISTORY_TURN_LIMIT = 3;

export const recentTurns = (history: ConversationTurn[]) => history.slice(-HISTORY_TURN_LIMIT);
