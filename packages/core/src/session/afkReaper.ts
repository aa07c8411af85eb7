import type { CancelHandle, Scheduler } from '../lib/scheduler.js';
import { createTimerScheduler } from '../lib/scheduler.js';

export type IdleCandidate = {
  sessionId: string;
  channelId: string;
  lastActivityAt: number;
};

/** 잠수 정리 대상이 되는 쪽. 실제 정리는 채널 락 안에서 다시 확인한 뒤 수행한다. */
export interface ReapableSessions {
  activeSessions(): IdleCandidate[];
  /** cutoff 이후 활동이 없으면 종료시키고 true */
  reap(channelId: string, sessionId: string, cutoff: number): Promise<boolean>;
}

export async function sweepIdleSessions(source: ReapableSessions, idleMs: number, now: number): Promise<number> {
  const cutoff = now - idleMs;
  let reaped = 0;
  for (const candidate of source.activeSessions()) {
    if (candidate.lastActivityAt >= cutoff) continue;
    if (await source.reap(candidate.channelId, candidate.sessionId, cutoff)) reaped += 1;
  }
  return reaped;
}

export type AfkReaperOptions = {
  source: ReapableSessions;
  intervalMs: number;
  idleMs: number;
  errorDelayMs?: number;
  maxDelayMs?: number;
  scheduler?: Scheduler;
  now?: () => number;
};

export type AfkReaperHandle = {
  stop(): void;
};

export function startAfkReaper(options: AfkReaperOptions): AfkReaperHandle {
  const scheduler = options.scheduler ?? createTimerScheduler();
  const now = options.now ?? Date.now;
  const errorDelayMs = options.errorDelayMs ?? 30_000;
  const maxDelayMs = options.maxDelayMs ?? 300_000;

  let isRunning = false;
  let stopped = false;
  let consecutiveErrors = 0;
  let pending: CancelHandle | null = null;

  const schedule = (delayMs: number) => {
    if (stopped) return;
    pending = scheduler.after(delayMs, () => {
      pending = null;
      void tick();
    });
  };

  const tick = async () => {
    if (isRunning || stopped) return;
    isRunning = true;

    let nextDelayMs = options.intervalMs;
    try {
      const reaped = await sweepIdleSessions(options.source, options.idleMs, now());
      if (reaped > 0) console.log(`[AfkReaper] 잠수 세션 ${reaped}개 정리`);
      consecutiveErrors = 0;
    } catch (error) {
      consecutiveErrors += 1;
      console.error(`[AfkReaper] tick failed (연속 ${consecutiveErrors}회):`, error);
      // 연속 에러 시 백오프 (최대 5분)
      nextDelayMs = Math.min(errorDelayMs * Math.pow(2, consecutiveErrors - 1), maxDelayMs);
    } finally {
      isRunning = false;
      schedule(nextDelayMs);
    }
  };

  schedule(options.intervalMs);

  return {
    stop() {
      stopped = true;
      if (pending) scheduler.cancel(pending);
      pending = null;
    }
  };
}
