import { StageTimeoutError } from "../core/errors";

export type Outcome<T> =
  | { kind: "ok"; value: T }
  | { kind: "error"; error: unknown }
  | { kind: "timeout" };

/**
 * One stage clock. It starts on construction, covers every attempt and backoff,
 * and cannot be reset. Expiry aborts `signal`.
 */
export class StageDeadline {
  private readonly controller = new AbortController();
  private readonly startedAt: number;
  private readonly timer: NodeJS.Timeout;
  private readonly expired: Promise<"timeout">;
  private readonly detachParent: () => void;

  constructor(
    private readonly stageName: string,
    private readonly timeoutMs: number,
    parent?: AbortSignal,
    private readonly now: () => number = Date.now
  ) {
    this.startedAt = this.now();
    let expire: () => void = () => undefined;
    this.expired = new Promise((resolve) => {
      expire = () => {
        if (!this.controller.signal.aborted) {
          this.controller.abort(new StageTimeoutError(this.stageName, this.timeoutMs));
        }
        resolve("timeout");
      };
    });
    this.timer = setTimeout(expire, Math.max(0, timeoutMs));

    if (parent?.aborted) {
      expire();
    }
    parent?.addEventListener("abort", expire, { once: true });
    this.detachParent = () => parent?.removeEventListener("abort", expire);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get timedOut(): boolean {
    return this.controller.signal.aborted;
  }

  remaining(): number {
    return Math.max(0, this.timeoutMs - (this.now() - this.startedAt));
  }

  /** Settles with whichever comes first: the task or the deadline. */
  async race<T>(task: () => Promise<T>): Promise<Outcome<T>> {
    if (this.timedOut) {
      return { kind: "timeout" };
    }
    const settled = Promise.resolve()
      .then(task)
      .then(
        (value): Outcome<T> => ({ kind: "ok", value }),
        (error: unknown): Outcome<T> => ({ kind: "error", error })
      );
    const outcome = await Promise.race([settled, this.expired.then((): Outcome<T> => ({ kind: "timeout" }))]);
    // a result that lands after expiry is dropped
    return this.timedOut ? { kind: "timeout" } : outcome;
  }

  /** Resolves false when the deadline expires first. */
  async sleep(ms: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const slept = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), ms);
    });
    try {
      return await Promise.race([slept, this.expired.then(() => false)]);
    } finally {
      clearTimeout(timer);
    }
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.detachParent();
  }
}
