/**
 * Charter Quote Service
 * Prices private charter trips from structured requests or chat messages
 */

import express, { ErrorRequestHandler, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createClient } from 'redis';
import {
  AircraftCatalog,
  ApiResponse,
  AirportCatalog,
  Clock,
  ConversationTurn,
  ErrorBody,
  ErrorCodes,
  ErrorResponse,
  HealthCheck,
  InvalidRouteError,
  NoAircraftAvailableError,
  PricingEngine,
  QuoteBuilder,
  StatusResponseBody,
  ValidationError,
  createDefaultAircraftCatalog,
  createDefaultAirportCatalog,
  encodeQuoteResponse,
  isNonEmptyString,
  parseQuoteRequest,
  todayIso
} from '@charterquote/shared';
import { ServiceConfig, loadConfig } from './config';
import { QuoteMetrics, createQuoteMetrics } from './metrics';
import { requestTracing } from './middleware/tracing';
import { ChatService } from './services/chatService';
import { CachedTripExtractor } from './services/extractionCache';
import { HeuristicTripParser } from './services/heuristicParser';
import { LanguageModelExtractor } from './services/languageModelExtractor';
import { TripExtractor } from './services/types';

type RedisClient = ReturnType<typeof createClient>;

export interface QuoteServiceOptions {
  config?: ServiceConfig;
  clock?: Clock;
  airports?: AirportCatalog;
  aircraft?: AircraftCatalog;
  extractor?: TripExtractor;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function toConversationTurn(entry: unknown): ConversationTurn | undefined {
  if (!isRecord(entry) || typeof entry.content !== 'string') return undefined;
  const { role, content } = entry;
  if (role === 'user' || role === 'assistant' || role === 'system') {
    return { role, content };
  }
  return undefined;
}

export class QuoteService {
  public readonly app: express.Application;
  private readonly config: ServiceConfig;
  private readonly airports: AirportCatalog;
  private readonly aircraft: AircraftCatalog;
  private readonly builder: QuoteBuilder;
  private readonly extractor: TripExtractor;
  private readonly chatService: ChatService;
  private readonly metrics: QuoteMetrics;
  private redis?: RedisClient;

  constructor(options: QuoteServiceOptions = {}) {
    this.config = options.config ?? loadConfig();
    const clock = options.clock ?? (() => todayIso());

    this.airports = options.airports ?? createDefaultAirportCatalog();
    this.aircraft = options.aircraft ?? createDefaultAircraftCatalog();
    this.builder = new QuoteBuilder(this.airports, this.aircraft, new PricingEngine(clock));
    this.extractor = options.extractor ?? this.createExtractor(clock);
    this.chatService = new ChatService(this.builder, this.extractor, new HeuristicTripParser(this.airports, clock));
    this.metrics = createQuoteMetrics();

    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  private createExtractor(clock: Clock): TripExtractor {
    const extractor = new LanguageModelExtractor(this.config.extraction, clock);
    if (!this.config.redisUrl) {
      return extractor;
    }

    this.redis = createClient({ url: this.config.redisUrl });
    this.redis.on('error', (error: Error) => console.error('Redis client error:', error.message));
    return new CachedTripExtractor(extractor, this.redis, this.config.extraction.cacheTtlSeconds, clock);
  }

  private setupMiddleware() {
    this.app.use(helmet());
    this.app.use(cors({ origin: this.config.corsOrigin }));
    this.app.use(express.json());
    this.app.use(requestTracing);

    this.app.use((req, res, next) => {
      res.on('finish', () => {
        this.metrics.requestsTotal.inc({
          route: req.route ? String(req.route.path) : 'unmatched',
          status: String(res.statusCode)
        });
      });
      next();
    });
  }

  private async initializeRedis() {
    if (!this.redis) return;
    try {
      await this.redis.connect();
      console.log('✅ Redis connected');
    } catch (error) {
      console.error('❌ Redis connection failed, extraction cache disabled:', error);
    }
  }

  private setupRoutes() {
    // Health check
    this.app.get('/health', (req, res) => {
      const health: ApiResponse<HealthCheck> = {
        success: true,
        data: {
          status: 'healthy',
          service: 'quote-svc',
          timestamp: new Date().toISOString()
        }
      };
      res.json(health);
    });

    this.app.post('/quote', this.createQuote.bind(this));
    this.app.post('/chat', this.chat.bind(this));
    this.app.get('/status', this.getStatus.bind(this));
    this.app.get('/metrics', this.getMetrics.bind(this));
  }

  private setupErrorHandling() {
    this.app.use((req: Request, res: Response) => {
      this.sendError(req, res, 404, { code: ErrorCodes.NOT_FOUND, message: `No route for ${req.method} ${req.path}` });
    });

    const handleError: ErrorRequestHandler = (error: unknown, req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        return next(error);
      }
      if (isRecord(error) && error.type === 'entity.parse.failed') {
        return this.sendError(req, res, 400, { code: ErrorCodes.INVALID_JSON, message: 'Request body is not valid JSON' });
      }
      this.handleError(error, req, res);
    };
    this.app.use(handleError);
  }

  private createQuote(req: Request, res: Response) {
    const endTimer = this.metrics.quoteDuration.startTimer({ route: 'quote' });
    try {
      const tripRequest = parseQuoteRequest(req.body);
      const quote = this.builder.build(tripRequest);
      res.json(encodeQuoteResponse(quote));
    } catch (error) {
      this.handleError(error, req, res);
    } finally {
      endTimer();
    }
  }

  private async chat(req: Request, res: Response) {
    const body: unknown = req.body;
    const fields: Record<string, unknown> = isRecord(body) ? body : {};
    const message = fields.message;

    if (!isNonEmptyString(message)) {
      return this.sendError(req, res, 400, {
        code: ErrorCodes.VALIDATION_ERROR,
        message: 'message is required',
        field: 'message'
      });
    }

    const rawHistory = fields.conversation_history ?? [];
    if (!Array.isArray(rawHistory)) {
      return this.sendError(req, res, 400, {
        code: ErrorCodes.VALIDATION_ERROR,
        message: 'conversation_history must be an array',
        field: 'conversation_history'
      });
    }
    const history = rawHistory
      .map(toConversationTurn)
      .filter((turn): turn is ConversationTurn => turn !== undefined);

    const endTimer = this.metrics.quoteDuration.startTimer({ route: 'chat' });
    try {
      const reply = await this.chatService.handleMessage(message.trim(), history);
      this.metrics.extractionsTotal.inc({ source: 'source' in reply ? reply.source : 'none' });
      res.json(reply);
    } catch (error) {
      this.handleError(error, req, res);
    } finally {
      endTimer();
    }
  }

  private getStatus(req: Request, res: Response) {
    const status: StatusResponseBody = {
      status: 'ok',
      extraction_service_available: this.extractor.isAvailable(),
      extraction_model: this.extractor.model,
      airports_count: this.airports.size,
      aircraft_types: this.aircraft.size
    };
    res.json(status);
  }

  private async getMetrics(req: Request, res: Response) {
    try {
      const body = await this.metrics.registry.metrics();
      res.set('Content-Type', this.metrics.registry.contentType);
      res.end(body);
    } catch (error) {
      this.handleError(error, req, res);
    }
  }

  private handleError(error: unknown, req: Request, res: Response) {
    if (error instanceof ValidationError) {
      const code = error instanceof InvalidRouteError ? ErrorCodes.INVALID_ROUTE : ErrorCodes.VALIDATION_ERROR;
      return this.sendError(req, res, 400, { code, message: error.message, field: error.field });
    }
    if (error instanceof NoAircraftAvailableError) {
      return this.sendError(req, res, 422, { code: ErrorCodes.NO_AIRCRAFT_AVAILABLE, message: error.message });
    }

    console.error('Quote service error:', error);
    this.sendError(req, res, 500, { code: ErrorCodes.INTERNAL_ERROR, message: 'Internal server error' });
  }

  private sendError(req: Request, res: Response, status: number, error: ErrorBody) {
    const body: ErrorResponse = {
      success: false,
      error: { ...error, traceId: req.traceId }
    };
    res.status(status).json(body);
  }

  async start() {
    await this.initializeRedis();
    this.app.listen(this.config.port, () => {
      console.log(`🚀 Quote service listening on port ${this.config.port}`);
    });
  }
}

const quoteService = new QuoteService();
export const app = quoteService.app;

if (require.main === module) {
  quoteService.start().catch((error) => {
    console.error('❌ Quote service failed to start:', error);
    process.exit(1);
  });
}

export default quoteService;
