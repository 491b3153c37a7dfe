/**
 * Transaction forwarding.
 *
 * POST /api/v1/transactions — Validate a signed order and hand it to the
 * partition node. Responds 202 with the transaction hash; inclusion is
 * observed later through the proof route.
 */

import { Hono } from "hono";
import type { TransactionForwarder } from "@tokenwallet/types";
import { transactionOrderSchema } from "@tokenwallet/types";
import type { AppEnv } from "../types/api-contract.js";
import { RequestValidationError, validateBody } from "../middleware/validate.js";

export interface TransactionRouteDeps {
  readonly forwarder: TransactionForwarder;
  readonly networkId: number;
  readonly partitionId: number;
}

export function createTransactionRoutes(deps: TransactionRouteDeps): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(transactionOrderSchema), async (c) => {
    const tx = c.get("validatedBody");
    const { networkId, partitionId } = tx.payload;

    if (networkId !== deps.networkId) {
      throw new RequestValidationError(
        `transaction is for network ${networkId}, expected ${deps.networkId}`,
      );
    }
    if (partitionId !== deps.partitionId) {
      throw new RequestValidationError(
        `transaction is for partition ${partitionId}, expected ${deps.partitionId}`,
      );
    }

    const txHash = await deps.forwarder.sendTransaction(tx);
    return c.json({ data: { txHash } }, 202);
  });

  return routes;
}
