/**
 * Binance 結合ストリームへ送る購読リクエスト（JSON-RPC 風）。
 * 応答は `{"result": null, "id": <id>}`、失敗時は `{"error": {"code": ..., "msg": ...}, "id": <id>}`。
 */
export interface BinanceControlRequest {
  method: 'SUBSCRIBE' | 'UNSUBSCRIBE';
  params: string[];
  id: number;
}

/**
 * 結合ストリームのイベント種別（data.e）。
 */
export type BinanceEventType = '24hrTicker' | 'trade' | 'kline' | 'depthUpdate';
