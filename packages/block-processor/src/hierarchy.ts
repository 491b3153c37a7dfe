/**
 * @tokenwallet/block-processor — Type hierarchy lookup.
 */

import type { Hex, TokenTypeUnit } from "@tokenwallet/types";
import { BlockProcessorError } from "./errors.js";
import type { Storage } from "./storage.js";

/**
 * Ancestor chain of a token type: the type itself first, its root last.
 *
 * @throws {BlockProcessorError} TYPE_NOT_FOUND when `id` or one of its
 *   ancestors is missing, INVALID_TRANSACTION on a parent cycle
 */
export function getTypeHierarchy(storage: Storage, id: Hex): TokenTypeUnit[] {
  const chain: TokenTypeUnit[] = [];
  const seen = new Set<Hex>();
  let next: Hex | null = id;

  while (next !== null) {
    if (seen.has(next)) {
      throw new BlockProcessorError("INVALID_TRANSACTION", `token type hierarchy of ${id} has a cycle at ${next}`);
    }
    seen.add(next);

    const type = storage.getTokenType(next);
    if (type === undefined) {
      throw new BlockProcessorError("TYPE_NOT_FOUND", `token type ${next} not found`);
    }
    chain.push(type);
    next = type.parentTypeId;
  }

  return chain;
}
