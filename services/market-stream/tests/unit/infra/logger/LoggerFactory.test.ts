import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { afterEach, describe, expect, it } from 'vitest';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { PinoLogger } from '@/infra/logger/PinoLogger';

describe('LoggerFactory', () => {
  afterEach(() => {
    LoggerFactory.reset();
  });

  it('create() はプロセス内で同じインスタンスを返す', () => {
    LoggerFactory.use(new PinoLogger({ level: 'silent', pretty: false }));

    expect(LoggerFactory.create()).toBe(LoggerFactory.create());
  });

  it('use() で差し込んだロガーが既定になり、reset() で外れる', () => {
    const logger = new LoggerMock();
    LoggerFactory.use(logger);

    expect(LoggerFactory.create()).toBe(logger);

    LoggerFactory.reset();
    LoggerFactory.use(new LoggerMock());
    expect(LoggerFactory.create()).not.toBe(logger);
  });
});
