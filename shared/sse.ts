import type { StageEvent } from './types';

export interface SseStreamOptions {
  heartbeatMs: number;
  onClose?: () => void;
}

export interface SseStream {
  send: <T>(event: StageEvent<T>) => void;
  sendJson: (eventName: string, payload: unknown) => void;
  close: () => void;
  isClosed: () => boolean;
}
