// policy/access.ts — Credit & access policy: pure authorization plus the conditional
// credit commit that runs only after a provider call succeeded.

import { logger } from "../config/logger.js";
import { GatewayError } from "../core/errors.js";
import { accessLevelName, type ModelDescriptor, type UserProfile } from "../core/types.js";
import type { ConversationStore } from "../store/conversation-store.js";

export type DenyReason = "ModelUnknown" | "InsufficientAccessLevel" | "InsufficientCredit";

export type Decision =
  | { allowed: true; model: ModelDescriptor; cost: number }
  | { allowed: false; reason: DenyReason; message: string };

function deny(reason: DenyReason, message: string): Decision {
  return { allowed: false, reason, message };
}

/** Model existence and access level only; credit is not considered. */
export function checkModelAccess(
  user: UserProfile,
  modelName: string,
  model: ModelDescriptor | null,
): Decision {
  if (!model) return deny("ModelUnknown", `Model '${modelName}' is not supported`);
  if (user.accessLevel < model.minAccessLevel) {
    return deny(
      "InsufficientAccessLevel",
      `Model '${model.name}' requires access level ${accessLevelName(model.minAccessLevel)}`,
    );
  }
  return { allowed: true, model, cost: model.creditCost };
}

/**
 * Decide whether `user` may run one completion on `model`. Nothing is reserved in the
 * store: the cost is deducted by `commitCredit` once the provider call has succeeded.
 */
export function authorize(
  user: UserProfile,
  modelName: string,
  model: ModelDescriptor | null,
): Decision {
  const access = checkModelAccess(user, modelName, model);
  if (!access.allowed) return access;
  if (user.creditBalance < access.cost) {
    return deny(
      "InsufficientCredit",
      `Insufficient credit: '${access.model.name}' costs ${access.cost}, balance is ${user.creditBalance}`,
    );
  }
  return access;
}

export function denialError(decision: Extract<Decision, { allowed: false }>): GatewayError {
  return new GatewayError(decision.reason, decision.message);
}

/**
 * Deduct `cost` only if the balance still covers it at commit time. A miss is retried
 * once when the re-read balance would now cover the cost (e.g. a grant landed in between).
 * Returns the balance after deduction.
 */
export async function commitCredit(
  store: ConversationStore,
  userId: string,
  cost: number,
): Promise<number> {
  let result = await store.adjustCredit(userId, -cost, cost);
  if (!result.applied && result.balance >= cost) {
    logger.debug({ userId, cost }, "Credit commit conflicted, retrying once");
    result = await store.adjustCredit(userId, -cost, cost);
  }
  if (!result.applied) {
    throw new GatewayError(
      "InsufficientCredit",
      `Insufficient credit: cost ${cost}, balance is ${result.balance}`,
    );
  }
  return result.balance;
}

/** Admin grant (negative amounts revoke) that never takes the balance below zero. */
export async function grantCredit(
  store: ConversationStore,
  userId: string,
  amount: number,
): Promise<number> {
  const result = await store.adjustCredit(userId, amount, Math.max(0, -amount));
  if (!result.applied) {
    throw new GatewayError(
      "InvalidInput",
      `Cannot remove ${-amount} credit: balance is ${result.balance}`,
    );
  }
  return result.balance;
}

/** Give back a committed deduction when the history write that follows it fails. */
export async function refundCredit(
  store: ConversationStore,
  userId: string,
  cost: number,
): Promise<void> {
  if (cost === 0) return;
  await store.adjustCredit(userId, cost, 0);
}
