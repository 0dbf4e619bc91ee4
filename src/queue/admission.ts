// queue/admission.ts — Admission queue: strict FIFO and one in-flight turn per user,
// a global ceiling on concurrent provider calls, per-request deadlines and cancellation.

import { randomUUID } from "node:crypto";
import pLimit, { type LimitFunction } from "p-limit";

import { logger } from "../config/logger.js";
import { abortError, GatewayError, toGatewayError } from "../core/errors.js";
import { TurnHandle, type TurnResult } from "./handle.js";

export interface AdmissionOptions {
  /** Turns a user may have waiting behind the one being processed. */
  perUserQueueDepth: number;
  globalConcurrency: number;
  requestTimeoutMs: number;
}

export interface TurnContext {
  requestId: string;
  signal: AbortSignal;
  emit: (text: string) => void;
}

export type TurnJob = (context: TurnContext) => Promise<TurnResult>;

interface UserLane {
  limit: LimitFunction;
  /** Admitted and not yet finished, including the running one. */
  size: number;
}

export interface AdmissionStats {
  users: number;
  admitted: number;
  running: number;
  waitingForSlot: number;
}

interface AbandonWait {
  promise: Promise<never>;
  dispose: () => void;
}

/** Rejects with the abort reason if the signal fires before the job has taken its slot. */
function abandonWhileWaiting(signal: AbortSignal, hasStarted: () => boolean): AbandonWait {
  let onAbort: () => void = () => undefined;
  const promise = new Promise<never>((_, reject) => {
    onAbort = () => {
      if (!hasStarted()) reject(abortError(signal));
    };
    signal.addEventListener("abort", onAbort, { once: true });
  });
  return { promise, dispose: () => signal.removeEventListener("abort", onAbort) };
}

export class AdmissionQueue {
  private readonly global: LimitFunction;
  private readonly lanes = new Map<string, UserLane>();

  constructor(private readonly options: AdmissionOptions) {
    this.global = pLimit(options.globalConcurrency);
  }

  /**
   * Returns immediately. A turn beyond the user's queue depth gets a handle that is
   * already finished with `Busy`; otherwise the job runs once every earlier turn of the
   * same user has finished and a global slot is free. The deadline starts when the turn
   * reaches the head of its user's queue and covers the wait for a global slot.
   */
  submit(userId: string, job: TurnJob): TurnHandle {
    const requestId = randomUUID();
    const lane = this.lanes.get(userId) ?? { limit: pLimit(1), size: 0 };

    if (lane.size > this.options.perUserQueueDepth) {
      logger.info({ userId, requestId, queued: lane.size }, "Turn rejected: user queue is full");
      return TurnHandle.rejected(
        requestId,
        userId,
        new GatewayError("Busy", "Still processing your previous messages, please wait"),
      );
    }

    lane.size += 1;
    this.lanes.set(userId, lane);
    const handle = new TurnHandle(requestId, userId);
    logger.debug({ userId, requestId, queued: lane.size }, "Turn admitted");

    void lane
      .limit(() => this.run(handle, job))
      .finally(() => {
        lane.size -= 1;
        if (lane.size === 0) this.lanes.delete(userId);
      });

    return handle;
  }

  private async run(handle: TurnHandle, job: TurnJob): Promise<void> {
    const { signal } = handle;
    if (signal.aborted) {
      handle.fail(abortError(signal));
      return;
    }

    logger.debug(
      { requestId: handle.id, userId: handle.userId, waitedMs: Date.now() - handle.enqueuedAt },
      "Turn reached the head of its queue",
    );
    const timer = setTimeout(() => {
      handle.abort(
        new GatewayError("Timeout", `No response within ${this.options.requestTimeoutMs}ms`),
      );
    }, this.options.requestTimeoutMs);

    let started = false;
    const slot = this.global(() => {
      signal.throwIfAborted();
      started = true;
      return job({
        requestId: handle.id,
        signal,
        emit: (text) => handle.pushChunk(text),
      });
    });
    const waiting = abandonWhileWaiting(signal, () => started);

    try {
      // A started job owns its signal and settles by itself; only the slot wait is raced.
      // The race also observes a stale slot's later throwIfAborted rejection.
      const result = await Promise.race([slot, waiting.promise]);
      handle.complete(result);
    } catch (error) {
      const failure = signal.aborted ? abortError(signal) : toGatewayError(error);
      if (failure.kind === "Internal") {
        logger.error({ err: error, requestId: handle.id, userId: handle.userId }, "Turn failed");
      }
      handle.fail(failure);
    } finally {
      clearTimeout(timer);
      waiting.dispose();
    }
  }

  /** Number of admitted, unfinished turns for one user. */
  depth(userId: string): number {
    return this.lanes.get(userId)?.size ?? 0;
  }

  stats(): AdmissionStats {
    let admitted = 0;
    for (const lane of this.lanes.values()) admitted += lane.size;
    return {
      users: this.lanes.size,
      admitted,
      running: this.global.activeCount,
      waitingForSlot: this.global.pendingCount,
    };
  }
}
