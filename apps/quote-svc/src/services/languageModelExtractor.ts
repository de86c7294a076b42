/**
 * Language model adapter for trip extraction.
 * Talks to an OpenAI-compatible chat completions endpoint.
 */

import axios, { AxiosInstance } from 'axios';
import {
  Clock,
  ConversationTurn,
  PartialTripRequest,
  isIsoDate,
  isNonEmptyString,
  isPositiveInteger,
  todayIso
} from '@charterquote/shared';
import { ExtractionConfig } from '../config';
import { ExtractionResult, TripExtractor, recentTurns } from './types';

interface ChatCompletionMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

interface ChatCompletionResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
}

const CODE_FENCE_REGEX = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

export function buildSystemPrompt(today: string): string {
  return [
    'You are a private aviation charter specialist.',
    'Extract the charter request from the conversation and answer with a single JSON object and nothing else.',
    'Keys: "origin" (airport code or city), "destination" (airport code or city),',
    '"departure_date" and "return_date" (YYYY-MM-DD), "passengers" (integer).',
    'Use null for anything the customer has not said. Resolve relative dates such as "next Friday".',
    `Today is ${today}.`
  ].join(' ');
}

/**
 * Reads the model's JSON answer, keeping only well-formed fields.
 * Returns undefined when the content is not a JSON object.
 */
export function parseExtraction(content: string): PartialTripRequest | undefined {
  const trimmed = content.trim();
  const unfenced = CODE_FENCE_REGEX.exec(trimmed)?.[1] ?? trimmed;

  let parsed: unknown;
  try {
    parsed = JSON.parse(unfenced);
  } catch {
    return undefined;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return undefined;
  }

  const fields: Record<string, unknown> = { ...parsed };
  const passengers = typeof fields.passengers === 'string' ? Number(fields.passengers) : fields.passengers;
  const request: PartialTripRequest = {};

  if (isNonEmptyString(fields.origin)) request.origin = fields.origin.trim();
  if (isNonEmptyString(fields.destination)) request.destination = fields.destination.trim();
  if (isIsoDate(fields.departure_date)) request.departureDate = fields.departure_date;
  if (isIsoDate(fields.return_date)) request.returnDate = fields.return_date;
  if (isPositiveInteger(passengers)) request.passengers = passengers;

  return request;
}

export class LanguageModelExtractor implements TripExtractor {
  private client: AxiosInstance;

  constructor(
    private readonly config: ExtractionConfig,
    private readonly clock: Clock = () => todayIso()
  ) {
    this.client = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs
    });
  }

  get model(): string | null {
    return this.isAvailable() ? this.config.model : null;
  }

  isAvailable(): boolean {
    return Boolean(this.config.apiKey);
  }

  /**
   * One attempt, bounded by the configured timeout. Failures are reported as
   * an unavailable result so the caller can fall back to heuristics.
   */
  async extract(message: string, history: ConversationTurn[]): Promise<ExtractionResult> {
    if (!this.config.apiKey) {
      return { status: 'unavailable', reason: 'not_configured' };
    }

    const messages: ChatCompletionMessage[] = [
      { role: 'system', content: buildSystemPrompt(this.clock()) },
      ...recentTurns(history)
        .filter((turn) => turn.role !== 'system')
        .map((turn): ChatCompletionMessage => ({ role: turn.role, content: turn.content })),
      { role: 'user', content: message }
    ];

    try {
      const response = await this.client.post<ChatCompletionResponse>(
        '/chat/completions',
        { model: this.config.model, temperature: 0, messages },
        { headers: { Authorization: `Bearer ${this.config.apiKey}` } }
      );

      const content = response.data.choices?.[0]?.message?.content;
      if (!content) {
        return this.unavailable('empty_response');
      }

      const request = parseExtraction(content);
      if (!request) {
        return this.unavailable('invalid_json');
      }
      if (Object.keys(request).length === 0) {
        return this.unavailable('nothing_extracted');
      }

      return { status: 'extracted', request };
    } catch (error) {
      return this.unavailable(describeFailure(error));
    }
  }

  private unavailable(reason: string): ExtractionResult {
    console.warn(`⚠️ Trip extraction unavailable (${reason}), falling back to heuristics`);
    return { status: 'unavailable', reason };
  }
}

function describeFailure(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return 'timeout';
    }
    if (error.response) {
      return `http_${error.response.status}`;
    }
    return error.code ?? 'network_error';
  }
  return error instanceof Error ? error.message : 'unexpected_error';
}
