// pipeline/chat-pipeline.ts — One turn end to end: policy check, context assembly,
// provider stream, then an all-or-nothing commit of credit and history.

import { logger } from "../config/logger.js";
import { abortError, GatewayError } from "../core/errors.js";
import type { ContentPart, TokenUsage } from "../core/types.js";
import { assembleContext } from "../context/assembler.js";
import { createTurn } from "../context/tokens.js";
import type { ProviderGateway } from "../gateway/gateway.js";
import { authorize, commitCredit, denialError, refundCredit } from "../policy/access.js";
import type { AdmissionQueue, TurnContext } from "../queue/admission.js";
import type { TurnHandle, TurnResult } from "../queue/handle.js";
import {
  type ConversationStore,
  ensureProfile,
  type ModelCatalog,
} from "../store/conversation-store.js";

export interface PipelineSettings {
  maxTokens: number;
  maxTurns: number;
  defaultSystemPrompt: string;
  defaultModel: string;
  seedCredit: number;
}

export interface SubmittedTurn {
  userId: string;
  content: ContentPart[];
}

export class ChatPipeline {
  constructor(
    private readonly store: ConversationStore,
    private readonly catalog: ModelCatalog,
    private readonly gateway: ProviderGateway,
    private readonly queue: AdmissionQueue,
    private readonly settings: PipelineSettings,
  ) {}

  /** Inbound entry point: queue the turn under its user and return the stream handle. */
  submit(turn: SubmittedTurn): TurnHandle {
    return this.queue.submit(turn.userId, (context) => this.process(turn, context));
  }

  /** Runs one dequeued turn. */
  private async process(turn: SubmittedTurn, { requestId, signal, emit }: TurnContext): Promise<TurnResult> {
    const { userId } = turn;
    const log = logger.child({ requestId, userId });

    const profile = await ensureProfile(this.store, userId, {
      creditBalance: this.settings.seedCredit,
    });
    const modelName = profile.preferredModel ?? this.settings.defaultModel;
    const decision = authorize(profile, modelName, await this.catalog.getModel(modelName));
    if (!decision.allowed) {
      log.info({ model: modelName, reason: decision.reason }, "Turn denied by policy");
      throw denialError(decision);
    }

    const userTurn = createTurn("user", turn.content);
    const history = await this.store.getHistory(userId);
    const context = assembleContext({
      systemPrompt: profile.systemPrompt,
      defaultSystemPrompt: this.settings.defaultSystemPrompt,
      history,
      newTurn: userTurn,
      maxTokens: this.settings.maxTokens,
      maxTurns: this.settings.maxTurns,
    });
    log.debug(
      {
        model: modelName,
        messages: context.messages.length,
        estimatedTokens: context.estimatedTokens,
        droppedTurns: context.droppedTurns,
      },
      "Context assembled",
    );

    let text = "";
    let usage: TokenUsage | null = null;
    for await (const event of this.gateway.stream({
      modelName,
      messages: context.messages,
      signal,
      requestId,
    })) {
      // Cooperative checkpoint at each token boundary
      if (signal.aborted) throw abortError(signal);
      if (event.type === "failed") throw event.error;
      if (event.type === "chunk") {
        text += event.text;
        emit(event.text);
      } else {
        usage = event.usage;
      }
    }
    if (signal.aborted) throw abortError(signal);
    if (!usage) throw new GatewayError("InvalidResponse", "Provider stream ended without completing");

    const creditBalance = await this.commit(userId, decision.cost, [
      userTurn,
      createTurn("assistant", [{ kind: "text", value: text }], modelName),
    ]);
    log.info({ model: modelName, cost: decision.cost, usage, creditBalance }, "Turn completed");

    return { model: modelName, text, usage, creditBalance };
  }

  /**
   * Deduct first, then append both turns in one store call. If the append fails the
   * deduction is refunded, so neither credit nor history is ever half-committed.
   */
  private async commit(
    userId: string,
    cost: number,
    turns: Parameters<ConversationStore["append"]>[1],
  ): Promise<number> {
    const balance = await commitCredit(this.store, userId, cost);
    try {
      await this.store.append(userId, turns);
    } catch (error) {
      logger.error({ err: error, userId, cost }, "History append failed, refunding credit");
      await refundCredit(this.store, userId, cost);
      throw error;
    }
    return balance;
  }
}
