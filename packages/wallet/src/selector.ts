/**
 * @tokenwallet/wallet — Unit selection.
 *
 * Pure functions over a token listing. Nothing here talks to the network.
 *
 * Rules:
 * - Only unlocked, unburned fungible units of the requested type are candidates
 * - The total is a saturating uint64 sum
 * - A single unit covering the target wins (closest match, first on ties)
 * - Otherwise units are accumulated largest first; the largest is the join target
 */

import type { FungibleTokenUnit, Hex, TokenUnit } from "@tokenwallet/types";
import { WalletError } from "./errors.js";
import { MAX_BURN_BATCH_SIZE, MAX_UINT64 } from "./types.js";

export type SelectionPlan =
  | {
      readonly kind: "single";
      readonly token: FungibleTokenUnit;
      /** Transfer when the amount matches exactly, otherwise split. */
      readonly action: "transfer" | "split";
    }
  | {
      readonly kind: "multi";
      /** Largest selected unit; locked, joined into, then split or transferred. */
      readonly target: FungibleTokenUnit;
      readonly burns: readonly FungibleTokenUnit[];
      /** Sum of all selected units. Never below the requested amount. */
      readonly total: bigint;
    };

export function isSpendable(token: TokenUnit): token is FungibleTokenUnit {
  return token.kind === "fungible" && !token.burned && token.lockStatus === 0;
}

export function candidateTokens(tokens: readonly TokenUnit[], typeId: Hex): FungibleTokenUnit[] {
  return tokens.filter(isSpendable).filter((t) => t.typeId === typeId);
}

export function saturatingSum(values: readonly bigint[]): bigint {
  let sum = 0n;
  for (const v of values) {
    sum += v;
    if (sum >= MAX_UINT64) return MAX_UINT64;
  }
  return sum;
}

/**
 * Unit with the smallest non-negative `amount - target`, or undefined
 * when no single unit covers the target. Ties keep the first unit.
 */
export function closestMatch(
  tokens: readonly FungibleTokenUnit[],
  target: bigint,
): FungibleTokenUnit | undefined {
  let best: FungibleTokenUnit | undefined;
  for (const token of tokens) {
    if (token.amount < target) continue;
    if (best === undefined || token.amount - target < best.amount - target) {
      best = token;
    }
  }
  return best;
}

/**
 * Plan a fungible transfer of `amount` units of `typeId`.
 *
 * @throws {WalletError} INVALID_AMOUNT for zero, INSUFFICIENT_TOKENS when
 *   the candidates do not add up to `amount`
 */
export function selectTokens(
  tokens: readonly TokenUnit[],
  typeId: Hex,
  amount: bigint,
): SelectionPlan {
  if (amount <= 0n) {
    throw new WalletError("INVALID_AMOUNT", `invalid amount: ${amount}`);
  }

  const candidates = candidateTokens(tokens, typeId);
  const total = saturatingSum(candidates.map((t) => t.amount));
  if (amount > total) {
    throw new WalletError(
      "INSUFFICIENT_TOKENS",
      `insufficient tokens of type ${typeId}: got ${total}, need ${amount}`,
    );
  }

  const single = closestMatch(candidates, amount);
  if (single !== undefined) {
    return { kind: "single", token: single, action: single.amount === amount ? "transfer" : "split" };
  }

  // Array.prototype.sort is stable: equal amounts keep listing order.
  const sorted = [...candidates].sort((a, b) =>
    a.amount > b.amount ? -1 : a.amount < b.amount ? 1 : 0,
  );

  const selected: FungibleTokenUnit[] = [];
  let sum = 0n;
  for (const token of sorted) {
    selected.push(token);
    sum += token.amount;
    if (sum >= amount) break;
  }

  const [target, ...burns] = selected;
  if (target === undefined) {
    throw new WalletError("INSUFFICIENT_TOKENS", `insufficient tokens of type ${typeId}`);
  }
  return { kind: "multi", target, burns, total: sum };
}

// =============================================================================
// Dust collection
// =============================================================================

/**
 * Group spendable tokens by type for dust collection. Groups with fewer
 * than two tokens are dropped. When `allowedTypeIds` is non-empty, only
 * those types are kept.
 */
export function dustGroups(
  tokens: readonly TokenUnit[],
  allowedTypeIds: readonly Hex[] = [],
): Map<Hex, FungibleTokenUnit[]> {
  const allowed = new Set(allowedTypeIds);
  const groups = new Map<Hex, FungibleTokenUnit[]>();

  for (const token of tokens) {
    if (!isSpendable(token)) continue;
    if (allowed.size > 0 && !allowed.has(token.typeId)) continue;
    const group = groups.get(token.typeId);
    if (group === undefined) {
      groups.set(token.typeId, [token]);
    } else {
      group.push(token);
    }
  }

  for (const [typeId, group] of groups) {
    if (group.length < 2) groups.delete(typeId);
  }
  return groups;
}

/** Split `items` into consecutive batches of at most `size`. */
export function toBatches<T>(items: readonly T[], size: number = MAX_BURN_BATCH_SIZE): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Transactions a dust collection of `tokenCount` tokens needs. The first
 * token is the join target and is never burned; every batch of burns adds
 * a lock and a join.
 */
export function dustTxCount(tokenCount: number, batchSize: number = MAX_BURN_BATCH_SIZE): number {
  if (tokenCount < 2) return 0;
  const burns = tokenCount - 1;
  return burns + 2 * Math.ceil(burns / batchSize);
}
