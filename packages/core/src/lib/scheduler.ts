export type CancelHandle = {
  readonly id: number;
  cancel(): void;
};

export interface Scheduler {
  after(ms: number, callback: () => void): CancelHandle;
  cancel(handle: CancelHandle): void;
}

/** setTimeout 기반 기본 스케줄러. 타이머가 프로세스 종료를 막지 않는다. */
export function createTimerScheduler(): Scheduler {
  let seq = 0;
  return {
    after(ms, callback) {
      const timer = setTimeout(callback, Math.max(0, ms));
      timer.unref();
      return { id: ++seq, cancel: () => clearTimeout(timer) };
    },
    cancel(handle) {
      handle.cancel();
    }
  };
}
