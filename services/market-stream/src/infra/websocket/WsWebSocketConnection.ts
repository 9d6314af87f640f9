import WebSocket, { type RawData } from 'ws';
import type { WebSocketConnection } from '@/application/interfaces/WebSocketConnection';
import { ConnectionLostError } from '@/domain/errors';

/**
 * `ws` パッケージを使った WebSocket 接続の実装
 *
 * Node.js 20 には安定版のグローバル WebSocket が無いため `ws` を使う。
 * ping/pong フレームと terminate() は `ws` の機能をそのまま使う。
 */
export class WsWebSocketConnection implements WebSocketConnection {
  private openCallbacks: Array<() => void> = [];
  private messageCallbacks: Array<(data: string) => void> = [];
  private closeCallbacks: Array<(code: number, reason: string) => void> = [];
  private errorCallbacks: Array<(error: Error) => void> = [];
  private pongCallbacks: Array<() => void> = [];

  constructor(private readonly socket: WebSocket) {
    this.socket.on('open', () => {
      for (const cb of this.openCallbacks) {
        cb();
      }
    });

    this.socket.on('message', (data: RawData) => {
      const text = rawDataToString(data);
      for (const cb of this.messageCallbacks) {
        cb(text);
      }
    });

    this.socket.on('close', (code: number, reason: Buffer) => {
      const text = reason.toString('utf8');
      for (const cb of this.closeCallbacks) {
        cb(code, text);
      }
    });

    this.socket.on('error', (error: Error) => {
      for (const cb of this.errorCallbacks) {
        cb(error);
      }
    });

    this.socket.on('pong', () => {
      for (const cb of this.pongCallbacks) {
        cb();
      }
    });
  }

  onOpen(callback: () => void): void {
    this.openCallbacks.push(callback);
  }

  onMessage(callback: (data: string) => void): void {
    this.messageCallbacks.push(callback);
  }

  onClose(callback: (code: number, reason: string) => void): void {
    this.closeCallbacks.push(callback);
  }

  onError(callback: (error: Error) => void): void {
    this.errorCallbacks.push(callback);
  }

  onPong(callback: () => void): void {
    this.pongCallbacks.push(callback);
  }

  send(data: string): void {
    this.socket.send(data);
  }

  ping(): void {
    if (this.socket.readyState === WebSocket.OPEN) {
      this.socket.ping();
    }
  }

  close(): void {
    this.socket.close();
  }

  removeAllListeners(): void {
    this.openCallbacks = [];
    this.messageCallbacks = [];
    this.closeCallbacks = [];
    this.errorCallbacks = [];
    this.pongCallbacks = [];
  }

  terminate(): void {
    this.socket.terminate();
  }
}

/**
 * 受信データを UTF-8 文字列にする。
 */
export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

/**
 * 接続を張り、open を待ってから WsWebSocketConnection を返す。
 * signal が中断されるか open 前に失敗した場合はソケットを破棄して reject する。
 */
export function connectWebSocket(url: string, signal: AbortSignal): Promise<WebSocketConnection> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new ConnectionLostError('aborted before connect'));
      return;
    }

    const socket = new WebSocket(url);
    const connection = new WsWebSocketConnection(socket);

    let settled = false;
    const fail = (error: Error) => {
      if (settled) {
        return;
      }
      settled = true;
      signal.removeEventListener('abort', onAbort);
      connection.removeAllListeners();
      // open 前の terminate は ws 側で error を投げるので握っておく
      socket.on('error', () => undefined);
      socket.terminate();
      reject(error);
    };
    const onAbort = () => fail(new ConnectionLostError('aborted during connect'));

    signal.addEventListener('abort', onAbort, { once: true });
    connection.onError((error) => fail(new ConnectionLostError(error.message, { cause: error })));
    connection.onClose((code, reason) => fail(new ConnectionLostError(`closed before open (code=${code} ${reason})`)));
    connection.onOpen(() => {
      settled = true;
      signal.removeEventListener('abort', onAbort);
      connection.removeAllListeners();
      resolve(connection);
    });
  });
}
