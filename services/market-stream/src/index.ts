export { DEFAULT_STREAM_CONFIG, resolveStreamConfig, validateStreamConfig } from '@/application/config/StreamConfig';
export type { OverflowPolicy, StreamConfig } from '@/application/config/StreamConfig';
export { ExchangeRegistry } from '@/application/exchange/ExchangeRegistry';
export type {
  ConnectorEvent,
  ConnectorFactory,
  ConnectorOptions,
  DecodedMessage,
  ExchangeConnector,
} from '@/application/interfaces/ExchangeConnector';
export type { LogMeta, Logger } from '@/application/interfaces/Logger';
export type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
export type { WebSocketConnection } from '@/application/interfaces/WebSocketConnection';
export { DEFAULT_ORDER_BOOK_DEPTH, MarketStreamClient } from '@/application/MarketStreamClient';
export type { MarketStreamClientOptions } from '@/application/MarketStreamClient';
export type { ReadableChannel } from '@/application/stream/Channel';
export { MarketStream } from '@/application/stream/MarketStream';
export type { StateListener, StreamStats } from '@/application/stream/MarketStream';
export * from '@/domain/errors';
export { StreamState } from '@/domain/models/StreamState';
export * from '@/domain/types';
export { BinanceConnector } from '@/infra/adapters/binance/BinanceConnector';
export { GmoConnector } from '@/infra/adapters/gmo/GmoConnector';
export { createDefaultRegistry } from '@/infra/adapters/registry';
export { PinoLogger } from '@/infra/logger/PinoLogger';
export { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';
