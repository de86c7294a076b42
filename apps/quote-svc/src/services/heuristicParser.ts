/**
 * Regex fallback for pulling a trip out of free text when the language model
 * is not available. Each concern (route, dates, passengers) is an ordered
 * list of independent matchers; the first one that yields a value wins.
 */

import {
  Airport,
  AirportCatalog,
  Clock,
  ConversationTurn,
  IsoDate,
  PartialTripRequest,
  todayIso
} from '@charterquote/shared';
import { parseDatePhrase } from './datePhrases';
import { recentTurns } from './types';

export interface RouteMatch {
  origin?: Airport;
  destination?: Airport;
}

const MAX_PLACE_WORDS = 3;

/** Words that are substrings of city names but never mean a place on their own. */
const PARTIAL_MATCH_STOPWORDS = new Set(['ago', 'all', 'ark', 'eat', 'for', 'las', 'los', 'new', 'ran', 'san', 'ton']);

const RETURN_CLAUSE_REGEX = /\b(?:return(?:ing)?|back|coming\s+back)\b/i;
const ROUND_TRIP_REGEX = /\bround[\s-]?trip\b/i;
const FROM_TO_REGEX = /\bfrom\s+(.+?)\s+to\s+(.+)/i;
const ARROW_REGEX = /(.+?)\s*(?:→|->)\s*(.+)/;
const TO_BOUNDARY_REGEX = /(?:^|\s+)to\s+/i;
const FROM_REGEX = /\bfrom\s+(.+)/i;
const AIRPORT_CODE_TOKEN_REGEX = /\b[A-Z]{3}\b/g;

const NUMBER_WORDS: Record<string, number> = {
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12,
  thirteen: 13,
  fourteen: 14,
  fifteen: 15,
  sixteen: 16,
  seventeen: 17,
  eighteen: 18,
  nineteen: 19,
  twenty: 20
};

const COUNT = `(\\d{1,3}|${Object.keys(NUMBER_WORDS).join('|')})`;
const PASSENGER_NOUN = '(?:pax|people|passengers?|guests?|persons|adults)';

/** Most specific first. */
const PASSENGER_PATTERNS: RegExp[] = [
  new RegExp(`\\b${COUNT}\\s*${PASSENGER_NOUN}\\b`, 'i'),
  new RegExp(`\\bparty\\s+of\\s+${COUNT}\\b`, 'i'),
  new RegExp(`\\bfor\\s+${COUNT}\\b(?!\\s*(?:days?|nights?|weeks?|hours?|hrs?|am|pm|:)|[/-]\\d)`, 'i')
];

const words = (phrase: string) => phrase.split(/[^A-Za-z]+/).filter(Boolean);

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

function parseCount(token: string): number | undefined {
  const value = /^\d+$/.test(token) ? Number(token) : NUMBER_WORDS[token.toLowerCase()];
  return value !== undefined && value >= 1 ? value : undefined;
}

export class HeuristicTripParser {
  constructor(
    private readonly airports: AirportCatalog,
    private readonly clock: Clock = () => todayIso()
  ) {}

  /**
   * Parses the user's recent turns oldest first, then the message itself;
   * anything said later overrides what was said before.
   */
  parseConversation(message: string, history: ConversationTurn[] = []): PartialTripRequest {
    const userTurns = recentTurns(history)
      .filter((turn) => turn.role === 'user')
      .map((turn) => turn.content);

    return [...userTurns, message].reduce<PartialTripRequest>((merged, text) => {
      const parsed = this.parse(text);
      return {
        origin: parsed.origin ?? merged.origin,
        destination: parsed.destination ?? merged.destination,
        departureDate: parsed.departureDate ?? merged.departureDate,
        returnDate: parsed.returnDate ?? merged.returnDate,
        passengers: parsed.passengers ?? merged.passengers
      };
    }, {});
  }

  parse(message: string): PartialTripRequest {
    const returnClause = RETURN_CLAUSE_REGEX.exec(message);
    const outboundText = returnClause ? message.slice(0, returnClause.index) : message;
    const returnText = returnClause ? message.slice(returnClause.index + returnClause[0].length) : '';

    const route = this.extractRoute(outboundText);
    const departureDate = this.extractDepartureDate(outboundText);
    const returnDate = this.extractReturnDate(returnText, departureDate, ROUND_TRIP_REGEX.test(message));

    const request: PartialTripRequest = {};
    if (route.origin) request.origin = route.origin.code;
    if (route.destination) request.destination = route.destination.code;
    if (departureDate) request.departureDate = departureDate;
    if (returnDate) request.returnDate = returnDate;

    const passengers = this.extractPassengers(message);
    if (passengers !== undefined) request.passengers = passengers;

    return request;
  }

  extractRoute(text: string): RouteMatch {
    const fromTo = FROM_TO_REGEX.exec(text);
    if (fromTo) {
      const origin = this.resolveLeading(fromTo[1]);
      const destination = this.resolveLeading(fromTo[2]);
      if (origin && destination) return { origin, destination };
    }

    const arrow = ARROW_REGEX.exec(text);
    if (arrow) {
      const origin = this.resolveTrailing(arrow[1]);
      const destination = this.resolveLeading(arrow[2]);
      if (origin && destination) return { origin, destination };
    }

    // "X to Y" at every "to"; remember the first place that follows a "to"
    let destination: Airport | undefined;
    const segments = text.split(TO_BOUNDARY_REGEX);
    for (let i = 0; i < segments.length - 1; i++) {
      const left = this.resolveTrailing(segments[i]);
      const right = this.resolveLeading(segments[i + 1]);
      if (left && right) return { origin: left, destination: right };
      destination = destination ?? right;
    }

    const fromOnly = FROM_REGEX.exec(text);
    let origin = fromOnly ? this.resolveLeading(fromOnly[1]) : undefined;

    // Places mentioned anywhere, in order: first is origin, second destination
    const mentioned = this.scanMentions(text);
    if (!origin && !destination) {
      return mentioned.length >= 2 ? { origin: mentioned[0], destination: mentioned[1] } : {};
    }
    origin = origin ?? mentioned.find((airport) => airport.code !== destination?.code);
    destination = destination ?? mentioned.find((airport) => airport.code !== origin?.code);

    return { origin, destination };
  }

  extractDepartureDate(text: string): IsoDate | undefined {
    return parseDatePhrase(text, this.clock());
  }

  /**
   * Return phrases resolve relative to the departure ("return Monday" is the
   * Monday after departure). A bare "round trip" is a same-day return.
   */
  extractReturnDate(text: string, departureDate: IsoDate | undefined, roundTrip: boolean): IsoDate | undefined {
    const reference = departureDate ?? this.clock();
    const parsed = text ? parseDatePhrase(text, reference) : undefined;
    if (parsed) return parsed;
    return roundTrip ? departureDate : undefined;
  }

  extractPassengers(text: string): number | undefined {
    for (const pattern of PASSENGER_PATTERNS) {
      const match = pattern.exec(text);
      const count = match ? parseCount(match[1]) : undefined;
      if (count !== undefined) return count;
    }
    return undefined;
  }

  /** Longest run of leading words the catalog resolves. */
  private resolveLeading(phrase: string): Airport | undefined {
    const candidates = words(phrase).slice(0, MAX_PLACE_WORDS);
    for (let length = candidates.length; length > 0; length--) {
      const airport = this.resolvePlace(candidates.slice(0, length).join(' '));
      if (airport) return airport;
    }
    return undefined;
  }

  /** Longest run of trailing words the catalog resolves. */
  private resolveTrailing(phrase: string): Airport | undefined {
    const candidates = words(phrase).slice(-MAX_PLACE_WORDS);
    for (let start = 0; start < candidates.length; start++) {
      const airport = this.resolvePlace(candidates.slice(start).join(' '));
      if (airport) return airport;
    }
    return undefined;
  }

  /**
   * A partial city match on a bare stopword ("for" in Fort Lauderdale) is not a place.
   */
  private resolvePlace(candidate: string): Airport | undefined {
    const match = this.airports.match(candidate);
    if (!match) return undefined;
    if (match.matchedField === 'partial' && PARTIAL_MATCH_STOPWORDS.has(candidate.toLowerCase())) {
      return undefined;
    }
    return match.airport;
  }

  /**
   * Airports named in the text (upper-case codes or city names), in order of
   * first appearance.
   */
  private scanMentions(text: string): Airport[] {
    const hits: Array<{ index: number; airport: Airport }> = [];

    for (const match of text.matchAll(AIRPORT_CODE_TOKEN_REGEX)) {
      const airport = this.airports.getByCode(match[0]);
      if (airport && match.index !== undefined) hits.push({ index: match.index, airport });
    }

    for (const airport of this.airports.listAll()) {
      const cityPattern = new RegExp(`\\b${escapeRegExp(airport.city)}\\b`, 'i');
      const match = cityPattern.exec(text);
      if (match) hits.push({ index: match.index, airport: this.airports.listByCity(airport.city)[0] });
    }

    const seen = new Set<string>();
    return hits
      .sort((a, b) => a.index - b.index)
      .map((hit) => hit.airport)
      .filter((airport) => {
        if (seen.has(airport.code)) return false;
        seen.add(airport.code);
        return true;
      });
  }
}
