import pino from 'pino';
import type { LogMeta, Logger } from '@/application/interfaces/Logger';

export interface PinoLoggerOptions {
  level?: string;
  /** pino-pretty で人間可読形式にする */
  pretty?: boolean;
}

/**
 * pino を使用したロガー実装
 *
 * 開発環境では `pino-pretty` を使用して人間可読形式で出力。
 * 本番環境では JSON 形式で出力。
 * child() は同じクラスで pino の子ロガーを包む。
 */
export class PinoLogger implements Logger {
  private readonly pinoLogger: pino.Logger;

  constructor(options: PinoLoggerOptions | pino.Logger = {}) {
    this.pinoLogger = isPinoLogger(options) ? options : createPino(options);
  }

  debug(msg: string, meta: LogMeta = {}): void {
    this.pinoLogger.debug(meta, msg);
  }

  info(msg: string, meta: LogMeta = {}): void {
    this.pinoLogger.info(meta, msg);
  }

  warn(msg: string, meta: LogMeta = {}): void {
    this.pinoLogger.warn(meta, msg);
  }

  error(msg: string, meta: LogMeta = {}): void {
    this.pinoLogger.error(meta, msg);
  }

  child(bindings: LogMeta): Logger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}

function isPinoLogger(value: PinoLoggerOptions | pino.Logger): value is pino.Logger {
  return 'child' in value && typeof value.child === 'function';
}

function createPino(options: PinoLoggerOptions): pino.Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? 'info';
  const usePretty = options.pretty ?? process.env.NODE_ENV !== 'production';

  if (!usePretty) {
    return pino({ level });
  }
  return pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    },
  });
}
