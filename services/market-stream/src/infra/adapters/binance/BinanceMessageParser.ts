import type { ConnectorEvent, DecodedMessage } from '@/application/interfaces/ExchangeConnector';
import { DecodeError, StreamError } from '@/domain/errors';
import { isKlineInterval } from '@/domain/types';
import {
  isRecord,
  type JsonRecord,
  parseJsonRecord,
  readBoolean,
  readNumber,
  readRecord,
  readString,
  readTupleLevels,
} from '@/infra/adapters/parse';
import type { BinanceEventType } from './types/BinanceControl';

const PROVIDER = 'binance';

/**
 * インフラ層: Binance 結合ストリーム（/stream）のメッセージパース処理
 *
 * 受信は `{"stream": "btcusdt@trade", "data": {...}}` の形で届き、stream がそのまま購読トピックになる。
 * 価格・数量は文字列で届く。
 */
export class BinanceMessageParser {
  /**
   * @throws {DecodeError} 解釈できない場合
   */
  parse(data: string): DecodedMessage {
    const message = parseJsonRecord(PROVIDER, data);

    if (isRecord(message.error)) {
      const code = message.error.code;
      const msg = typeof message.error.msg === 'string' ? message.error.msg : 'unknown error';
      return {
        type: 'error',
        error: new StreamError(PROVIDER, `request ${String(message.id)}`, `code=${String(code)} ${msg}`),
      };
    }
    if ('result' in message && 'id' in message) {
      return { type: 'control' };
    }

    const topic = readString(PROVIDER, message, 'stream');
    const payload = readRecord(PROVIDER, message, 'data');
    return { type: 'event', topic, event: parseEvent(payload) };
  }
}

const EVENT_PARSERS: Record<BinanceEventType, (payload: JsonRecord) => ConnectorEvent> = {
  '24hrTicker': (payload) => parseTicker(payload),
  trade: (payload) => parseTrade(payload),
  kline: (payload) => parseKline(payload),
  depthUpdate: (payload) => parseDepthUpdate(payload),
};

function isBinanceEventType(value: string): value is BinanceEventType {
  return Object.hasOwn(EVENT_PARSERS, value);
}

function parseEvent(payload: JsonRecord): ConnectorEvent {
  const eventType = readString(PROVIDER, payload, 'e');
  if (!isBinanceEventType(eventType)) {
    throw new DecodeError(PROVIDER, `unknown event type "${eventType}"`);
  }
  return EVENT_PARSERS[eventType](payload);
}

function parseTicker(payload: JsonRecord): ConnectorEvent {
  return {
    kind: 'ticker',
    data: {
      symbol: readString(PROVIDER, payload, 's'),
      lastPrice: readNumber(PROVIDER, payload, 'c'),
      bidPrice: readNumber(PROVIDER, payload, 'b'),
      bidQty: readNumber(PROVIDER, payload, 'B'),
      askPrice: readNumber(PROVIDER, payload, 'a'),
      askQty: readNumber(PROVIDER, payload, 'A'),
      high24h: readNumber(PROVIDER, payload, 'h'),
      low24h: readNumber(PROVIDER, payload, 'l'),
      volume24h: readNumber(PROVIDER, payload, 'v'),
      timestamp: readNumber(PROVIDER, payload, 'E'),
    },
  };
}

function parseTrade(payload: JsonRecord): ConnectorEvent {
  // m: 買い手がメイカー = 売り手がテイカー
  const isBuyerMaker = readBoolean(PROVIDER, payload, 'm');
  return {
    kind: 'trade',
    data: {
      id: String(readNumber(PROVIDER, payload, 't')),
      symbol: readString(PROVIDER, payload, 's'),
      price: readNumber(PROVIDER, payload, 'p'),
      qty: readNumber(PROVIDER, payload, 'q'),
      side: isBuyerMaker ? 'sell' : 'buy',
      isBuyerMaker,
      timestamp: readNumber(PROVIDER, payload, 'T'),
    },
  };
}

function parseKline(payload: JsonRecord): ConnectorEvent {
  const kline = readRecord(PROVIDER, payload, 'k');
  const interval = readString(PROVIDER, kline, 'i');
  if (!isKlineInterval(interval)) {
    throw new DecodeError(PROVIDER, `unknown kline interval "${interval}"`);
  }
  return {
    kind: 'kline',
    data: {
      symbol: readString(PROVIDER, payload, 's'),
      interval,
      openTime: readNumber(PROVIDER, kline, 't'),
      closeTime: readNumber(PROVIDER, kline, 'T'),
      open: readNumber(PROVIDER, kline, 'o'),
      high: readNumber(PROVIDER, kline, 'h'),
      low: readNumber(PROVIDER, kline, 'l'),
      close: readNumber(PROVIDER, kline, 'c'),
      volume: readNumber(PROVIDER, kline, 'v'),
      quoteVolume: readNumber(PROVIDER, kline, 'q'),
      tradeCount: readNumber(PROVIDER, kline, 'n'),
      isClosed: readBoolean(PROVIDER, kline, 'x'),
    },
  };
}

function parseDepthUpdate(payload: JsonRecord): ConnectorEvent {
  return {
    kind: 'orderbook.diff',
    symbol: readString(PROVIDER, payload, 's'),
    data: {
      firstUpdateId: readNumber(PROVIDER, payload, 'U'),
      finalUpdateId: readNumber(PROVIDER, payload, 'u'),
      bids: readTupleLevels(PROVIDER, payload, 'b'),
      asks: readTupleLevels(PROVIDER, payload, 'a'),
      timestamp: readNumber(PROVIDER, payload, 'E'),
    },
  };
}
