/**
 * @tokenwallet/wallet — Fee credit gate.
 *
 * Reads the account's fee credit record through the RpcClient. The
 * record ID is derived from the account's P2PKH owner predicate, so no
 * lookup by owner is needed.
 */

import { p2pkhPredicate } from "@tokenwallet/predicates";
import type { AccountKeyProvider, FeeManager, Hex, RpcClient } from "@tokenwallet/types";
import { feeCreditRecordIdFor, toHex } from "@tokenwallet/types";
import { WalletError } from "./errors.js";

export class RpcFeeManager implements FeeManager {
  private readonly rpc: RpcClient;
  private readonly keys: AccountKeyProvider;
  private readonly maxFee: bigint;

  constructor(rpc: RpcClient, keys: AccountKeyProvider, maxFee: bigint) {
    this.rpc = rpc;
    this.keys = keys;
    this.maxFee = maxFee;
  }

  async feeCreditRecordId(accountNumber: number): Promise<Hex> {
    const key = await this.keys.getAccountKey(accountNumber);
    return feeCreditRecordIdFor(toHex(p2pkhPredicate(key.pubKeyHash)));
  }

  /**
   * @throws {WalletError} NO_FEE_CREDIT, FEE_CREDIT_LOCKED or
   *   INSUFFICIENT_FEE_CREDIT when the balance is below `txCount` max fees
   */
  async ensureFeeCredit(accountNumber: number, txCount: number): Promise<Hex> {
    const id = await this.feeCreditRecordId(accountNumber);
    const bill = await this.rpc.getFeeCreditRecord(id);
    if (bill === null) {
      throw new WalletError("NO_FEE_CREDIT", "no fee credit in token wallet");
    }
    if (bill.lockStatus !== 0) {
      throw new WalletError("FEE_CREDIT_LOCKED", `fee credit record ${id} is locked`);
    }
    const required = BigInt(txCount) * this.maxFee;
    if (bill.balance < required) {
      throw new WalletError(
        "INSUFFICIENT_FEE_CREDIT",
        `insufficient fee credit balance for transaction(s): have ${bill.balance}, need ${required}`,
      );
    }
    return id;
  }
}
