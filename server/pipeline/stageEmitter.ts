export type { StageEvent, StageName, StageStatus } from '../../shared/types';

import type { StageEvent, StageName, StageStatus } from '../../shared/types';
import { describeError } from '../obs/logger';

export type StageEventSender = <T>(event: StageEvent<T>) => void;

export interface StagePayload<T> {
  message?: string;
  data?: T;
}

export interface StageEmitter {
  start: <T>(payload?: StagePayload<T>) => void;
  progress: <T>(payload?: StagePayload<T>) => void;
  success: <T>(payload?: StagePayload<T>) => void;
  failure: (error: unknown) => void;
}

/** Binds a run id and stage name so call sites only pass what changed. */
export const makeStageEmitter = (runId: string, stage: StageName, send: StageEventSender): StageEmitter => {
  const emit = <T>(status: StageStatus, payload?: StagePayload<T>) =>
    send<T>({
      runId,
      stage,
      status,
      message: payload?.message,
      data: payload?.data,
      ts: new Date().toISOString(),
    });

  return {
    start: (payload) => emit('start', payload),
    progress: (payload) => emit('progress', payload),
    success: (payload) => emit('success', payload),
    failure: (error) => {
      const message = describeError(error);
      emit('failure', { message, data: { error: message } });
    },
  };
};
