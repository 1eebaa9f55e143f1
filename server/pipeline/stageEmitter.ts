export type { StageEvent, StageName, StageStatus } from '../../shared/types';

import type { StageEvent, StageName, StageStatus } from '../../shared/types';

export type StageEventSender = <T>(event: StageEvent<T>) => void;

export type StageEmitter = ReturnType<typeof makeStageEmitter>;

const nowIso = () => new Date().toISOString();

export const makeStageEmitter = (runId: string, stage: StageName, send?: StageEventSender) => {
  const emit = <T>(status: StageStatus, payload?: { message?: string; data?: T }) => {
    send?.({
      runId,
      stage,
      status,
      message: payload?.message,
      data: payload?.data,
      ts: nowIso(),
    });
  };

  return {
    start: <T>(payload?: { message?: string; data?: T }) => emit('start', payload),
    progress: <T>(payload?: { message?: string; data?: T }) => emit('progress', payload),
    success: <T>(payload?: { message?: string; data?: T }) => emit('success', payload),
    failure: (error: unknown, options?: { data?: unknown }) => {
      const message = error instanceof Error ? error.message : String(error);
      emit('failure', { message, data: options?.data ?? { error: message } });
    },
  };
};
