import { ConversationTurn, PartialTripRequest } from '@charterquote/shared';
import { ServiceConfig } from '../config';
import { ExtractionResult, TripExtractor } from '../services/types';

// 2026-03-02 is a Monday
export const TODAY = '2026-03-02';
export const fixedClock = () => TODAY;

export function testConfig(overrides: Partial<ServiceConfig['extraction']> = {}): ServiceConfig {
  return {
    port: 0,
    corsOrigin: '*',
    extraction: {
      model: 'gpt-4',
      baseUrl: 'http://llm.test/v1',
      timeoutMs: 1000,
      cacheTtlSeconds: 60,
      ...overrides
    }
  };
}

/**
 * Extractor that answers from a fixed queue and records what it was asked.
 */
export class StubExtractor implements TripExtractor {
  readonly calls: Array<{ message: string; history: ConversationTurn[] }> = [];

  constructor(
    private readonly results: ExtractionResult[],
    readonly model: string | null = 'stub-model'
  ) {}

  static returning(request: PartialTripRequest): StubExtractor {
    return new StubExtractor([{ status: 'extracted', request }]);
  }

  isAvailable(): boolean {
    return this.model !== null;
  }

  async extract(message: string, history: ConversationTurn[]): Promise<ExtractionResult> {
    this.calls.push({ message, history });
    return this.results.shift() ?? { status: 'unavailable', reason: 'exhausted' };
  }
}
