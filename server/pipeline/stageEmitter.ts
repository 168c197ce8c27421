export type { StageEvent, StageName, StageStatus } from '../../shared/types';

import type { StageEvent, StageName, StageStatus } from '../../shared/types';

export type StageEventSender = <T>(event: StageEvent<T>) => void;

const nowIso = () => new Date().toISOString();

export interface StageEmitter {
  start: <T>(payload?: { message?: string; data?: T }) => void;
  success: <T>(payload?: { message?: string; data?: T }) => void;
  failure: (error: unknown) => void;
  /** start → `work` → success, or failure and rethrow. */
  run: <R>(message: string, work: () => Promise<R>, summarize?: (result: R) => string) => Promise<R>;
}

export const makeStageEmitter = (runId: string, stage: StageName, send: StageEventSender): StageEmitter => {
  const emit = <T>(status: StageStatus, payload?: { message?: string; data?: T }) =>
    send<T>({ runId, stage, status, message: payload?.message, data: payload?.data, ts: nowIso() });

  const emitter: StageEmitter = {
    start: (payload) => emit('start', payload),
    success: (payload) => emit('success', payload),
    failure: (error) => {
      const message = error instanceof Error ? error.message : String(error);
      emit('failure', { message, data: { error: message } });
    },
    run: async (message, work, summarize) => {
      emitter.start({ message });
      try {
        const result = await work();
        emitter.success({ message: summarize?.(result) });
        return result;
      } catch (error) {
        emitter.failure(error);
        throw error;
      }
    },
  };
  return emitter;
};
