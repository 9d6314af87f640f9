/**
 * 購読ごとのライフサイクル状態。
 *
 * idle → connecting → active ⇄ reconnecting → closed の順に進み、
 * どの状態からでも unsubscribe / キャンセルで closing → closed に落ちる。
 * closed は終端で、戻ることはない。
 */
export const StreamState = {
  Idle: 'idle',
  Connecting: 'connecting',
  Active: 'active',
  Reconnecting: 'reconnecting',
  Closing: 'closing',
  Closed: 'closed',
} as const;

export type StreamState = (typeof StreamState)[keyof typeof StreamState];

const TRANSITIONS: Record<StreamState, readonly StreamState[]> = {
  idle: ['connecting', 'closing'],
  // 再接続が無効な場合は connecting / active から直接 closed に落ちる
  connecting: ['active', 'reconnecting', 'closing', 'closed'],
  active: ['reconnecting', 'closing', 'closed'],
  reconnecting: ['connecting', 'closing', 'closed'],
  closing: ['closed'],
  closed: [],
};

export function canTransition(from: StreamState, to: StreamState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * 購読がもう動いていない（あるいは止まりかけている）か。
 */
export function isTerminal(state: StreamState): boolean {
  return state === StreamState.Closing || state === StreamState.Closed;
}
