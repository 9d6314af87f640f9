import 'dotenv/config';
import process from 'node:process';
import { MarketStreamClient } from '@/application/MarketStreamClient';
import { CollectStreamUsecase } from '@/application/usecases/CollectStreamUsecase';
import { createDefaultRegistry } from '@/infra/adapters/registry';
import { loadCollectorEnv } from '@/infra/config/env';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { MetricsServer } from '@/infra/metrics/MetricsServer';
import { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';
import { StreamRepository } from '@/infra/redis/StreamRepository';
import { StreamCollector } from '@/presentation/collector/StreamCollector';

/**
 * エントリーポイント: アプリケーションの起動処理、依存関係の注入、シグナルハンドリング
 *
 * 責務:
 * - `.env` 読み込みと環境変数の検証
 * - コンポーネントの生成と初期化
 * - シグナルハンドリング
 *
 * 注意: 接続の維持や正規化ロジックは main.ts に置かず、ただ「配線するだけ」にする。
 */
async function bootstrap(): Promise<void> {
  const logger = LoggerFactory.create();
  const env = loadCollectorEnv();

  const registry = createDefaultRegistry();
  const connector = registry.create(env.exchangeName, { logger });

  const metrics = new PrometheusMetricsCollector();
  const metricsServer = env.metricsPort === null ? null : new MetricsServer(metrics, env.metricsPort, logger);
  await metricsServer?.start();

  const publisher = new StreamRepository(env.redisUrl, logger, metrics);
  const client = new MarketStreamClient(connector, { config: env.streamConfig, logger, metrics });
  const usecase = new CollectStreamUsecase(connector.name, publisher, logger, metrics);
  const collector = new StreamCollector(client, env.feeds, usecase, logger);

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('Shutting down collector...');
    await collector.stop();
    await publisher.close();
    await metricsServer?.stop();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error('Shutdown failed', { err: error });
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  logger.info('Collector started', { exchange: connector.name, feeds: env.feeds.length });
  await collector.start();
}

bootstrap().catch((error: unknown) => {
  LoggerFactory.create().error('Failed to bootstrap collector', { err: error });
  process.exit(1);
});
