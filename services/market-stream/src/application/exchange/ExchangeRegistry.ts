import type {
  ConnectorFactory,
  ConnectorOptions,
  ExchangeConnector,
} from '@/application/interfaces/ExchangeConnector';
import { DuplicateProviderError, ValidationError } from '@/domain/errors';

/**
 * 取引所コネクタのレジストリ。
 * プロセス全体の状態は持たず、利用側が生成して持ち回す。
 */
export class ExchangeRegistry {
  private readonly factories = new Map<string, ConnectorFactory>();

  /**
   * @throws {DuplicateProviderError} 同名の取引所が登録済みの場合
   */
  register(name: string, factory: ConnectorFactory): this {
    const key = name.trim().toLowerCase();
    if (this.factories.has(key)) {
      throw new DuplicateProviderError(key);
    }
    this.factories.set(key, factory);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name.trim().toLowerCase());
  }

  providers(): string[] {
    return [...this.factories.keys()].sort();
  }

  /**
   * @throws {ValidationError} 未登録の取引所
   */
  create(name: string, options: ConnectorOptions = {}): ExchangeConnector {
    const key = name.trim().toLowerCase();
    const factory = this.factories.get(key);
    if (!factory) {
      throw new ValidationError('exchange', `unknown provider "${name}" (available: ${this.providers().join(', ') || 'none'})`);
    }
    return factory(options);
  }
}
