import { describe, it, expect } from '@jest/globals';
import { createDefaultAirportCatalog } from '@charterquote/shared';
import { HeuristicTripParser } from '../services/heuristicParser';
import { fixedClock } from './fixtures';

describe('HeuristicTripParser', () => {
  const parser = new HeuristicTripParser(createDefaultAirportCatalog(), fixedClock);
  const route = (text: string) => {
    const match = parser.extractRoute(text);
    return { origin: match.origin?.code, destination: match.destination?.code };
  };

  describe('extractRoute', () => {
    it('should read "from X to Y"', () => {
      expect(route('from Boston to Chicago')).toEqual({ origin: 'BOS', destination: 'ORD' });
      expect(route('fly from new york to los angeles next friday')).toEqual({ origin: 'JFK', destination: 'LAX' });
    });

    it('should read arrows', () => {
      expect(route('SEA → DFW')).toEqual({ origin: 'SEA', destination: 'DFW' });
      expect(route('SEA -> DFW')).toEqual({ origin: 'SEA', destination: 'DFW' });
    });

    it('should read "X to Y" with aliases', () => {
      expect(route('Vegas to SFO')).toEqual({ origin: 'LAS', destination: 'SFO' });
      expect(route('Need a jet, NYC to Miami')).toEqual({ origin: 'JFK', destination: 'MIA' });
    });

    it('should take places in order of mention', () => {
      expect(route('Heading out of Dallas, landing in Seattle')).toEqual({ origin: 'DFW', destination: 'SEA' });
    });

    it('should keep a lone origin', () => {
      expect(route('from Miami')).toEqual({ origin: 'MIA', destination: undefined });
    });

    it('should not read common words as partial city names', () => {
      expect(route('Jet for 4 to Miami from Boston')).toEqual({ origin: 'BOS', destination: 'MIA' });
      expect(route('Fly us all to Seattle from Miami')).toEqual({ origin: 'MIA', destination: 'SEA' });
    });

    it('should not guess from a single place', () => {
      expect(route('Just Boston')).toEqual({ origin: undefined, destination: undefined });
    });
  });

  describe('extractPassengers', () => {
    it('should read counts in digits and words', () => {
      expect(parser.extractPassengers('6 pax')).toBe(6);
      expect(parser.extractPassengers('twelve passengers')).toBe(12);
      expect(parser.extractPassengers('party of eight')).toBe(8);
      expect(parser.extractPassengers('seats for 3')).toBe(3);
    });

    it('should ignore durations, dates and zero', () => {
      expect(parser.extractPassengers('staying for 3 nights')).toBeUndefined();
      expect(parser.extractPassengers('for 12/20')).toBeUndefined();
      expect(parser.extractPassengers('for 3-4 hours')).toBeUndefined();
      expect(parser.extractPassengers('0 people')).toBeUndefined();
    });
  });

  describe('parse', () => {
    it('should treat a bare round trip as a same-day return', () => {
      expect(parser.parse('Round trip from Boston to Chicago on April 10 for 5')).toEqual({
        origin: 'BOS',
        destination: 'ORD',
        departureDate: '2026-04-10',
        returnDate: '2026-04-10',
        passengers: 5
      });
    });

    it('should date the return relative to departure', () => {
      expect(parser.parse('LAX to LAS tomorrow, back on Sunday, party of eight')).toEqual({
        origin: 'LAX',
        destination: 'LAS',
        departureDate: '2026-03-03',
        returnDate: '2026-03-08',
        passengers: 8
      });
    });

    it('should read "for M/D" as a date rather than a head count', () => {
      expect(parser.parse('Boston to Miami for 12/20')).toEqual({
        origin: 'BOS',
        destination: 'MIA',
        departureDate: '2026-12-20'
      });
    });

    it('should return nothing for small talk', () => {
      expect(parser.parse('hello there')).toEqual({});
    });
  });

  describe('parseConversation', () => {
    it('should let later turns override earlier ones', () => {
      const request = parser.parseConversation('April 10 for 2', [
        { role: 'user', content: 'Boston to Chicago' },
        { role: 'assistant', content: 'When would you like to fly?' },
        { role: 'user', content: 'Make that Dallas to Chicago' }
      ]);

      expect(request).toEqual({
        origin: 'DFW',
        destination: 'ORD',
        departureDate: '2026-04-10',
        passengers: 2
      });
    });

    it('should only read the most recent turns', () => {
      const request = parser.parseConversation('tomorrow', [
        { role: 'user', content: 'SEA to BOS' },
        { role: 'user', content: 'hi' },
        { role: 'user', content: 'hello' },
        { role: 'user', content: 'for 4 people' }
      ]);

      expect(request).toEqual({ departureDate: '2026-03-03', passengers: 4 });
    });
  });
});
