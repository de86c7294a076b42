import { Counter, Histogram, Registry } from 'prom-client';

export interface QuoteMetrics {
  registry: Registry;
  requestsTotal: Counter<'route' | 'status'>;
  quoteDuration: Histogram<'route'>;
  extractionsTotal: Counter<'source'>;
}

/**
 * Each service instance owns its registry so instances never collide on
 * metric names.
 */
export function createQuoteMetrics(): QuoteMetrics {
  const registry = new Registry();

  return {
    registry,
    requestsTotal: new Counter({
      name: 'quote_svc_requests_total',
      help: 'Total number of requests processed',
      labelNames: ['route', 'status'] as const,
      registers: [registry]
    }),
    quoteDuration: new Histogram({
      name: 'quote_svc_quote_duration_seconds',
      help: 'Time spent building quotes in seconds',
      labelNames: ['route'] as const,
      buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5],
      registers: [registry]
    }),
    extractionsTotal: new Counter({
      name: 'quote_svc_chat_extractions_total',
      help: 'Chat messages by the interpreter that handled them',
      labelNames: ['source'] as const,
      registers: [registry]
    })
  };
}
