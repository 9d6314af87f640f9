/**
 * GMO コイン WebSocket API のチャンネル。
 */
export type GmoChannel = 'ticker' | 'orderbooks' | 'trades';

export const GMO_CHANNELS: readonly GmoChannel[] = ['ticker', 'orderbooks', 'trades'];

export function isGmoChannel(value: string): value is GmoChannel {
  return GMO_CHANNELS.some((channel) => channel === value);
}

/**
 * GMO コイン WebSocket API に送信するコマンドの型定義。
 */
export interface GmoCommand {
  command: 'subscribe' | 'unsubscribe';
  channel: GmoChannel;
  symbol: string;
}
