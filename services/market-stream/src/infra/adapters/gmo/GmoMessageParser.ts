import type { ConnectorEvent, DecodedMessage } from '@/application/interfaces/ExchangeConnector';
import { DecodeError, StreamError } from '@/domain/errors';
import {
  type JsonRecord,
  parseJsonRecord,
  readNumber,
  readObjectLevels,
  readString,
  readTimestamp,
} from '@/infra/adapters/parse';
import { gmoTopic } from './types/GmoTopic';

const PROVIDER = 'gmo';

/**
 * インフラ層: GMO メッセージ形式のパース処理（実装の詳細を担当）
 *
 * 責務: GMO の受信メッセージ → ConnectorEvent への変換。
 * 数値はすべて文字列で届く。orderbooks チャンネルは毎回全量を送ってくるので、常にスナップショットとして扱う。
 *
 * ```json
 * {"channel":"ticker","ask":"750760","bid":"750600","high":"762302","last":"756662","low":"704874","symbol":"BTC","timestamp":"2018-03-30T12:34:56.789Z","volume":"194785.8484"}
 * {"channel":"orderbooks","asks":[{"price":"455659","size":"0.1"}],"bids":[{"price":"455665","size":"0.1"}],"symbol":"BTC","timestamp":"2018-03-30T12:34:56.789Z"}
 * {"channel":"trades","price":"750760","side":"BUY","size":"0.1","timestamp":"2018-03-30T12:34:56.789Z","symbol":"BTC"}
 * {"error":"ERR-5003 Request too many."}
 * ```
 */
export class GmoMessageParser {
  /**
   * @throws {DecodeError} 解釈できない場合
   */
  parse(data: string): DecodedMessage {
    const message = parseJsonRecord(PROVIDER, data);

    if (typeof message.error === 'string') {
      // ERR-5003 (Request too many) は購読リクエストの送信間隔が不十分
      return { type: 'error', error: new StreamError(PROVIDER, 'control', message.error) };
    }

    const channel = readString(PROVIDER, message, 'channel');
    const symbol = readString(PROVIDER, message, 'symbol');

    switch (channel) {
      case 'ticker':
        return { type: 'event', topic: gmoTopic('ticker', symbol), event: parseTicker(message, symbol) };
      case 'orderbooks':
        return { type: 'event', topic: gmoTopic('orderbooks', symbol), event: parseOrderBook(message, symbol) };
      case 'trades':
        return { type: 'event', topic: gmoTopic('trades', symbol), event: parseTrade(message, symbol) };
      default:
        throw new DecodeError(PROVIDER, `unknown channel "${channel}"`);
    }
  }
}

function parseTicker(message: JsonRecord, symbol: string): ConnectorEvent {
  return {
    kind: 'ticker',
    data: {
      symbol,
      lastPrice: readNumber(PROVIDER, message, 'last'),
      bidPrice: readNumber(PROVIDER, message, 'bid'),
      askPrice: readNumber(PROVIDER, message, 'ask'),
      high24h: readNumber(PROVIDER, message, 'high'),
      low24h: readNumber(PROVIDER, message, 'low'),
      volume24h: readNumber(PROVIDER, message, 'volume'),
      timestamp: readTimestamp(PROVIDER, message, 'timestamp'),
    },
  };
}

function parseOrderBook(message: JsonRecord, symbol: string): ConnectorEvent {
  const timestamp = readTimestamp(PROVIDER, message, 'timestamp');
  return {
    kind: 'orderbook.snapshot',
    symbol,
    data: {
      // 更新 ID が無いのでタイムスタンプをウォーターマークに使う
      lastUpdateId: timestamp,
      bids: readObjectLevels(PROVIDER, message, 'bids'),
      asks: readObjectLevels(PROVIDER, message, 'asks'),
      timestamp,
    },
  };
}

function parseTrade(message: JsonRecord, symbol: string): ConnectorEvent {
  const side = readString(PROVIDER, message, 'side');
  if (side !== 'BUY' && side !== 'SELL') {
    throw new DecodeError(PROVIDER, `unknown trade side "${side}"`);
  }
  const timestamp = readTimestamp(PROVIDER, message, 'timestamp');
  const price = readNumber(PROVIDER, message, 'price');
  const qty = readNumber(PROVIDER, message, 'size');
  return {
    kind: 'trade',
    data: {
      // 約定 ID は配信されない
      id: `${timestamp}-${side}-${price}-${qty}`,
      symbol,
      price,
      qty,
      side: side === 'BUY' ? 'buy' : 'sell',
      isBuyerMaker: side === 'SELL',
      timestamp,
    },
  };
}
