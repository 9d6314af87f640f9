import type { GmoChannel } from './GmoCommand';

/**
 * 購読トピック名（`channel:symbol`）。デコード結果の topic と一致させる。
 */
export function gmoTopic(channel: GmoChannel, symbol: string): string {
  return `${channel}:${symbol}`;
}
