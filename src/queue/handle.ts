// queue/handle.ts — Caller-side handle of a queued turn: an event stream that always ends
// with exactly one `done` or `error`, plus cooperative cancellation.

import { Channel } from "../core/channel.js";
import { GatewayError } from "../core/errors.js";
import type { TokenUsage } from "../core/types.js";

export interface TurnResult {
  model: string;
  text: string;
  usage: TokenUsage;
  creditBalance: number;
}

export type TurnEvent =
  | { type: "chunk"; text: string }
  | { type: "done"; result: TurnResult }
  | { type: "error"; error: GatewayError };

export type TurnOutcome = { ok: true; result: TurnResult } | { ok: false; error: GatewayError };

export class TurnHandle implements AsyncIterable<TurnEvent> {
  readonly enqueuedAt = Date.now();
  /** Resolves (never rejects) once the turn has finished. */
  readonly outcome: Promise<TurnOutcome>;

  private readonly controller = new AbortController();
  private readonly events = new Channel<TurnEvent>();
  private readonly settle: (outcome: TurnOutcome) => void;
  private refusal: GatewayError | null = null;
  private finished = false;

  constructor(
    readonly id: string,
    readonly userId: string,
  ) {
    let settle: (outcome: TurnOutcome) => void = () => undefined;
    this.outcome = new Promise((resolve) => {
      settle = resolve;
    });
    this.settle = settle;
  }

  /** A handle refused at admission, already finished with `error`. */
  static rejected(id: string, userId: string, error: GatewayError): TurnHandle {
    const handle = new TurnHandle(id, userId);
    handle.refusal = error;
    handle.fail(error);
    return handle;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get admitted(): boolean {
    return this.refusal === null;
  }

  get rejection(): GatewayError | null {
    return this.refusal;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  /** Cancel from the caller's side, e.g. when the client disconnects. */
  cancel(): void {
    this.abort(new GatewayError("Cancelled", "Request was cancelled"));
  }

  abort(reason: GatewayError): void {
    if (this.finished || this.controller.signal.aborted) return;
    this.controller.abort(reason);
  }

  pushChunk(text: string): void {
    if (this.finished || this.controller.signal.aborted) return;
    this.events.push({ type: "chunk", text });
  }

  complete(result: TurnResult): void {
    if (this.finished) return;
    this.finished = true;
    this.events.push({ type: "done", result });
    this.events.close();
    this.settle({ ok: true, result });
  }

  fail(error: GatewayError): void {
    if (this.finished) return;
    this.finished = true;
    this.events.push({ type: "error", error });
    this.events.close();
    this.settle({ ok: false, error });
  }

  [Symbol.asyncIterator](): AsyncIterator<TurnEvent> {
    return this.events[Symbol.asyncIterator]();
  }
}
