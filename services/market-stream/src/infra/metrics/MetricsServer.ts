import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';

/**
 * メトリクス HTTP サーバー
 *
 * 責務: /metrics エンドポイントで Prometheus 形式のメトリクスを公開
 */
export class MetricsServer {
  private server: Server | null = null;

  constructor(
    private readonly metricsCollector: MetricsCollector,
    private readonly port: number,
    private readonly logger: Logger
  ) {}

  /**
   * HTTP サーバーを起動し、listen が完了したら解決する
   */
  start(): Promise<void> {
    const server = createServer((req, res) => {
      this.handle(req, res).catch((error: unknown) => {
        this.logger.error('Metrics request failed', { err: error });
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, () => {
        server.off('error', reject);
        this.logger.info('Metrics server started', { port: this.port });
        resolve();
      });
    });
  }

  /**
   * HTTP サーバーを停止
   */
  stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (req.url !== '/metrics' || req.method !== 'GET') {
      res.statusCode = 404;
      res.end('Not Found');
      return;
    }

    try {
      const metrics = await this.metricsCollector.getMetrics();
      res.setHeader('Content-Type', this.metricsCollector.getRegistry().contentType);
      res.statusCode = 200;
      res.end(metrics);
    } catch (error) {
      this.logger.error('Failed to get metrics', { err: error });
      res.statusCode = 500;
      res.end('Internal Server Error');
    }
  }
}
