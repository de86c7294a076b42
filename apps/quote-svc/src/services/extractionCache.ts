import { createHash } from 'crypto';
import { Clock, ConversationTurn, PartialTripRequest, encodePartialTripRequest, todayIso } from '@charterquote/shared';
import { parseExtraction } from './languageModelExtractor';
import { ExtractionResult, TripExtractor, recentTurns } from './types';

/**
 * The slice of the node-redis client the cache needs.
 */
export interface ExtractionCacheStore {
  readonly isReady: boolean;
  get(key: string): Promise<unknown>;
  setEx(key: string, seconds: number, value: string): Promise<unknown>;
}

const CACHE_PREFIX = 'chat_extract';

/**
 * Caches successful extractions in Redis. The key includes today's date
 * because the model resolves relative dates against it.
 */
export class CachedTripExtractor implements TripExtractor {
  constructor(
    private readonly inner: TripExtractor,
    private readonly store: ExtractionCacheStore,
    private readonly ttlSeconds: number,
    private readonly clock: Clock = () => todayIso()
  ) {}

  get model(): string | null {
    return this.inner.model;
  }

  isAvailable(): boolean {
    return this.inner.isAvailable();
  }

  cacheKey(message: string, history: ConversationTurn[]): string {
    const digest = createHash('sha256')
      .update(JSON.stringify({ history: recentTurns(history), message: message.trim().toLowerCase() }))
      .digest('hex');
    return `${CACHE_PREFIX}:${this.clock()}:${digest}`;
  }

  async extract(message: string, history: ConversationTurn[]): Promise<ExtractionResult> {
    if (!this.inner.isAvailable()) {
      return this.inner.extract(message, history);
    }

    const key = this.cacheKey(message, history);
    const cached = await this.read(key);
    if (cached) {
      return { status: 'extracted', request: cached };
    }

    const result = await this.inner.extract(message, history);
    if (result.status === 'extracted') {
      await this.write(key, result.request);
    }
    return result;
  }

  private async read(key: string): Promise<PartialTripRequest | undefined> {
    if (!this.store.isReady) return undefined;
    try {
      const cached = await this.store.get(key);
      return typeof cached === 'string' ? parseExtraction(cached) : undefined;
    } catch (error) {
      console.error('Extraction cache read error:', error);
      return undefined;
    }
  }

  private async write(key: string, request: PartialTripRequest): Promise<void> {
    if (!this.store.isReady) return;
    try {
      await this.store.setEx(key, this.ttlSeconds, JSON.stringify(encodePartialTripRequest(request)));
    } catch (error) {
      console.error('Extraction cache write error:', error);
    }
  }
}
