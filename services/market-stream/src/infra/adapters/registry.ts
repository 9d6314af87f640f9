import { ExchangeRegistry } from '@/application/exchange/ExchangeRegistry';
import { BinanceConnector } from './binance/BinanceConnector';
import { GmoConnector } from './gmo/GmoConnector';

/**
 * 同梱のコネクタ（binance, gmo）を登録したレジストリを作る。
 */
export function createDefaultRegistry(): ExchangeRegistry {
  return new ExchangeRegistry()
    .register('binance', (options) => new BinanceConnector(options))
    .register('gmo', (options) => new GmoConnector(options));
}
