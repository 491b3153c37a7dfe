/**
 * @tokenwallet/sdk — Partition node JSON-RPC client.
 *
 * The backend reads blocks through this client and forwards wallet
 * transactions to the node unchanged.
 */

import { z } from "zod";
import type { Block, BlockSource, Hex, TransactionForwarder, TransactionOrder } from "@tokenwallet/types";
import { blockSchema, hexSchema, toJsonValue, uint64Schema } from "@tokenwallet/types";
import { decode } from "./decode.js";
import { HttpClient } from "./http-client.js";
import type { HttpClientConfig } from "./types.js";
import { RpcError } from "./types.js";

const responseSchema = z.union([
  z.object({
    jsonrpc: z.literal("2.0"),
    id: z.number(),
    error: z.object({
      code: z.number().int(),
      message: z.string(),
      data: z.unknown().optional(),
    }),
  }),
  z.object({
    jsonrpc: z.literal("2.0"),
    id: z.number(),
    result: z.unknown(),
  }),
]);

export class PartitionRpcClient implements BlockSource, TransactionForwarder {
  private readonly http: HttpClient;
  private nextId = 1;

  /** `baseUrl` is the node's JSON-RPC endpoint, e.g. "http://localhost:26866/rpc". */
  constructor(config: HttpClientConfig) {
    this.http = new HttpClient(config);
  }

  async getRoundNumber(): Promise<bigint> {
    return decode(uint64Schema, await this.call("state_getRoundNumber", []), "round number");
  }

  async getBlock(round: bigint): Promise<Block | null> {
    const result = await this.call("state_getBlock", [round.toString()]);
    if (result === null || result === undefined) {
      return null;
    }
    return decode(blockSchema, result, "block");
  }

  async sendTransaction(tx: TransactionOrder): Promise<Hex> {
    return decode(hexSchema, await this.call("state_sendTransaction", [toJsonValue(tx)]), "transaction hash");
  }

  private async call(method: string, params: readonly unknown[]): Promise<unknown> {
    const id = this.nextId++;
    const res = await this.http.post("", { jsonrpc: "2.0", id, method, params });
    const response = decode(responseSchema, res.body, `${method} response`, res.status);

    if ("error" in response) {
      throw new RpcError(
        "RPC_ERROR",
        `${method} failed: ${response.error.message} (code ${response.error.code})`,
        res.status,
        response.error.data,
      );
    }
    return response.result;
  }
}
