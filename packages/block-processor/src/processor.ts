/**
 * @tokenwallet/block-processor — Block Processor.
 *
 * Replays finalized blocks into Storage, one transaction at a time, in
 * block order. Every transition is written straight to Storage inside a
 * storage transaction, so a failing transaction undoes the whole block
 * and leaves the block number unchanged.
 *
 * Rules:
 * - Block rounds must strictly increase (gaps are fine)
 * - Token transactions pay their fee from the fee credit record named
 *   in the client metadata, failed ones included
 * - Failed transactions change nothing but the fee balance
 * - Every record gets an inclusion proof stored under its hash
 */

import pino from "pino";
import type { Logger } from "pino";
import { decodeP2pkhProof } from "@tokenwallet/predicates";
import type {
  Block,
  FeeCreditBill,
  FungibleTokenUnit,
  Hex,
  NonFungibleTokenUnit,
  PayloadOf,
  TokenUnit,
  TransactionOrder,
  TransactionRecord,
  TxProof,
} from "@tokenwallet/types";
import {
  blockHeaderHash,
  formatUnitTag,
  fromHex,
  isHex,
  splitTokenId,
  toHex,
  transactionHash,
  transactionRecordHash,
  UnitTag,
  unitTagOf,
} from "@tokenwallet/types";
import { BlockProcessorError } from "./errors.js";
import { MerkleTree, verifyTxProof } from "./merkle.js";
import type { Storage } from "./storage.js";

const MAX_UINT64 = (1n << 64n) - 1n;

const FEE_CREDIT_TYPES = new Set<string>(["addFC", "closeFC", "lockFC", "unlockFC"]);

export interface BlockProcessorOptions {
  readonly logger?: Logger | undefined;
}

/** Context shared by the transitions of one transaction. */
interface TxContext {
  readonly txHash: Hex;
  readonly fee: bigint;
  readonly order: TransactionOrder;
}

export class BlockProcessor {
  private readonly storage: Storage;
  private readonly logger: Logger;

  constructor(storage: Storage, options: BlockProcessorOptions = {}) {
    this.storage = storage;
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  /**
   * Apply a block.
   *
   * @throws {BlockProcessorError} INVALID_BLOCK_ORDER when the round does
   *   not exceed the last applied round; any other code when a transaction
   *   cannot be applied (the block is then rolled back).
   */
  processBlock(block: Block): void {
    const round = block.header.round;
    const last = this.storage.getBlockNumber();
    if (round <= last) {
      throw new BlockProcessorError(
        "INVALID_BLOCK_ORDER",
        `invalid block, received block ${round}, current wallet block ${last}`,
      );
    }

    this.storage.runInTransaction(() => {
      const leaves = block.transactions.map((r) => transactionRecordHash(r));
      const tree = MerkleTree.build(leaves);
      const txRoot = tree.getRoot();
      const headerHash = txRoot === null ? null : blockHeaderHash(block.header, txRoot);

      block.transactions.forEach((record, i) => {
        const path = tree.getProof(i);
        if (txRoot === null || headerHash === null || path === null) {
          throw new BlockProcessorError("INVALID_TRANSACTION", "merkle path unavailable");
        }
        const txProof: TxProof = {
          partitionId: block.header.partitionId,
          round,
          previousBlockHash: block.header.previousBlockHash,
          txRoot,
          blockHeaderHash: headerHash,
          leafIndex: i,
          siblings: path.siblings,
        };
        this.processTx(record, txProof);
      });

      this.storage.setBlockNumber(round);
    });

    this.logger.info(
      { round: round.toString(), transactions: block.transactions.length },
      "block processed",
    );
  }

  // ===========================================================================
  // Transactions
  // ===========================================================================

  private processTx(record: TransactionRecord, txProof: TxProof): void {
    const order = record.transactionOrder;
    const payload = order.payload;
    const ctx: TxContext = {
      txHash: transactionHash(order),
      fee: record.serverMetadata.actualFee,
      order,
    };

    this.storage.saveTxProof(ctx.txHash, { txRecord: record, txProof });

    const isFeeCreditTx = FEE_CREDIT_TYPES.has(payload.type);

    if (record.serverMetadata.successIndicator === "failed") {
      const fcrId = payload.clientMetadata.feeCreditRecordId ?? (isFeeCreditTx ? payload.unitId : null);
      if (fcrId !== null && this.storage.getFeeCreditBill(fcrId) !== undefined) {
        this.chargeFee(fcrId, ctx.fee);
      }
      this.logger.warn(
        { txHash: ctx.txHash, type: payload.type, unitId: payload.unitId },
        "failed transaction, fee charged only",
      );
      return;
    }

    if (!isFeeCreditTx) {
      const fcrId = payload.clientMetadata.feeCreditRecordId;
      if (fcrId === null) {
        throw new BlockProcessorError(
          "INVALID_TRANSACTION",
          `transaction ${ctx.txHash} has no fee credit record`,
        );
      }
      this.chargeFee(fcrId, ctx.fee);
    }

    this.logger.debug({ txHash: ctx.txHash, type: payload.type, unitId: payload.unitId }, "applying transaction");

    switch (payload.type) {
      case "defineFT":
        return this.defineFungibleType(payload, ctx);
      case "defineNFT":
        return this.defineNonFungibleType(payload, ctx);
      case "mintFT":
        return this.mintFungible(payload, ctx);
      case "mintNFT":
        return this.mintNonFungible(payload, ctx);
      case "transFT":
        return this.transferFungible(payload, ctx);
      case "transNFT":
        return this.transferNonFungible(payload, ctx);
      case "splitFT":
        return this.split(payload, ctx);
      case "burnFT":
        return this.burn(payload, ctx);
      case "joinFT":
        return this.join(payload, ctx);
      case "updateNFT":
        return this.updateNonFungible(payload, ctx);
      case "lockToken":
        return this.lockToken(payload, ctx);
      case "unlockToken":
        return this.unlockToken(payload, ctx);
      case "addFC":
        return this.addFeeCredit(payload, ctx);
      case "closeFC":
        return this.closeFeeCredit(payload, ctx);
      case "lockFC":
        return this.lockFeeCredit(payload, ctx);
      case "unlockFC":
        return this.unlockFeeCredit(payload, ctx);
    }
  }

  // ─── Token Types ────────────────────────────────────────────────────

  private defineFungibleType(payload: PayloadOf<"defineFT">, ctx: TxContext): void {
    const a = payload.attributes;
    this.checkNewType(payload.unitId, UnitTag.FungibleTokenType);

    if (a.parentTypeId !== null) {
      const parent = this.storage.getTokenType(a.parentTypeId);
      if (parent === undefined || parent.kind !== "fungible") {
        throw new BlockProcessorError("TYPE_NOT_FOUND", `parent type ${a.parentTypeId} not found`);
      }
      if (parent.decimalPlaces !== a.decimalPlaces) {
        throw new BlockProcessorError(
          "INVALID_TRANSACTION",
          `parent type requires ${parent.decimalPlaces} decimal places, got ${a.decimalPlaces}`,
        );
      }
    }

    this.storage.saveTokenType({
      kind: "fungible",
      id: payload.unitId,
      parentTypeId: a.parentTypeId,
      symbol: a.symbol,
      name: a.name,
      icon: a.icon,
      subTypeCreationPredicate: a.subTypeCreationPredicate,
      tokenMintingPredicate: a.tokenMintingPredicate,
      tokenTypeOwnerPredicate: a.tokenTypeOwnerPredicate,
      decimalPlaces: a.decimalPlaces,
      creator: creatorOf(ctx.order),
      txHash: ctx.txHash,
    });
  }

  private defineNonFungibleType(payload: PayloadOf<"defineNFT">, ctx: TxContext): void {
    const a = payload.attributes;
    this.checkNewType(payload.unitId, UnitTag.NonFungibleTokenType);

    if (a.parentTypeId !== null) {
      const parent = this.storage.getTokenType(a.parentTypeId);
      if (parent === undefined || parent.kind !== "nft") {
        throw new BlockProcessorError("TYPE_NOT_FOUND", `parent type ${a.parentTypeId} not found`);
      }
    }

    this.storage.saveTokenType({
      kind: "nft",
      id: payload.unitId,
      parentTypeId: a.parentTypeId,
      symbol: a.symbol,
      name: a.name,
      icon: a.icon,
      subTypeCreationPredicate: a.subTypeCreationPredicate,
      tokenMintingPredicate: a.tokenMintingPredicate,
      tokenTypeOwnerPredicate: a.tokenTypeOwnerPredicate,
      dataUpdatePredicate: a.dataUpdatePredicate,
      creator: creatorOf(ctx.order),
      txHash: ctx.txHash,
    });
  }

  private checkNewType(id: Hex, tag: UnitTag): void {
    if (unitTagOf(id) !== tag) {
      throw new BlockProcessorError(
        "INVALID_TRANSACTION",
        `invalid token type ID: expected unit type is ${formatUnitTag(tag)}`,
      );
    }
    if (this.storage.getTokenType(id) !== undefined) {
      throw new BlockProcessorError("INVALID_TRANSACTION", `token type ${id} already exists`);
    }
  }

  // ─── Minting ────────────────────────────────────────────────────────

  private mintFungible(payload: PayloadOf<"mintFT">, ctx: TxContext): void {
    const a = payload.attributes;
    const type = this.storage.getTokenType(a.typeId);
    if (type === undefined || type.kind !== "fungible") {
      throw new BlockProcessorError("TYPE_NOT_FOUND", `fungible token type ${a.typeId} not found`);
    }
    this.checkNewToken(payload.unitId);

    this.storage.saveToken({
      kind: "fungible",
      id: payload.unitId,
      typeId: a.typeId,
      typeName: type.name,
      symbol: type.symbol,
      owner: a.ownerPredicate,
      counter: 0n,
      txHash: ctx.txHash,
      lockStatus: 0,
      amount: a.value,
      decimals: type.decimalPlaces,
      burned: false,
    });
  }

  private mintNonFungible(payload: PayloadOf<"mintNFT">, ctx: TxContext): void {
    const a = payload.attributes;
    const type = this.storage.getTokenType(a.typeId);
    if (type === undefined || type.kind !== "nft") {
      throw new BlockProcessorError("TYPE_NOT_FOUND", `non-fungible token type ${a.typeId} not found`);
    }
    this.checkNewToken(payload.unitId);

    this.storage.saveToken({
      kind: "nft",
      id: payload.unitId,
      typeId: a.typeId,
      typeName: type.name,
      symbol: type.symbol,
      owner: a.ownerPredicate,
      counter: 0n,
      txHash: ctx.txHash,
      lockStatus: 0,
      nftName: a.name,
      nftUri: a.uri,
      nftData: a.data,
      nftDataUpdatePredicate: a.dataUpdatePredicate,
    });
  }

  private checkNewToken(id: Hex): void {
    if (this.storage.getToken(id) !== undefined) {
      throw new BlockProcessorError("INVALID_TRANSACTION", `token ${id} already exists`);
    }
  }

  // ─── Transfers ──────────────────────────────────────────────────────

  private transferFungible(payload: PayloadOf<"transFT">, ctx: TxContext): void {
    const token = this.unlocked(this.fungible(payload.unitId));
    if (token.typeId !== payload.attributes.typeId) {
      throw new BlockProcessorError(
        "INVALID_TRANSACTION",
        `invalid type: token type ${token.typeId}, transaction type ${payload.attributes.typeId}`,
      );
    }
    this.storage.saveToken({
      ...token,
      owner: payload.attributes.newOwnerPredicate,
      counter: token.counter + 1n,
      txHash: ctx.txHash,
    });
  }

  private transferNonFungible(payload: PayloadOf<"transNFT">, ctx: TxContext): void {
    const token = this.unlocked(this.nonFungible(payload.unitId));
    this.storage.saveToken({
      ...token,
      owner: payload.attributes.newOwnerPredicate,
      counter: token.counter + 1n,
      txHash: ctx.txHash,
    });
  }

  // ─── Split / Burn / Join ────────────────────────────────────────────

  private split(payload: PayloadOf<"splitFT">, ctx: TxContext): void {
    const a = payload.attributes;
    const token = this.unlocked(this.fungible(payload.unitId));

    if (token.typeId !== a.typeId) {
      throw new BlockProcessorError(
        "INVALID_SPLIT",
        `invalid type: token type ${token.typeId}, transaction type ${a.typeId}`,
      );
    }
    if (a.targetValue === 0n || a.remainingValue + a.targetValue !== token.amount) {
      throw new BlockProcessorError(
        "INVALID_SPLIT",
        `invalid split: remaining ${a.remainingValue} + target ${a.targetValue} != amount ${token.amount}`,
      );
    }

    this.storage.saveToken({
      ...token,
      amount: a.remainingValue,
      counter: token.counter + 1n,
      txHash: ctx.txHash,
    });

    const newId = splitTokenId(ctx.order);
    this.checkNewToken(newId);
    this.storage.saveToken({
      kind: "fungible",
      id: newId,
      typeId: token.typeId,
      typeName: token.typeName,
      symbol: token.symbol,
      owner: a.newOwnerPredicate,
      counter: 0n,
      txHash: ctx.txHash,
      lockStatus: 0,
      amount: a.targetValue,
      decimals: token.decimals,
      burned: false,
    });
  }

  private burn(payload: PayloadOf<"burnFT">, ctx: TxContext): void {
    const a = payload.attributes;
    const token = this.unlocked(this.fungible(payload.unitId));

    if (token.burned) {
      throw new BlockProcessorError("INVALID_BURN", `token ${token.id} is already burned`);
    }
    if (token.typeId !== a.typeId) {
      throw new BlockProcessorError(
        "INVALID_BURN",
        `type ID mismatch: token type ${token.typeId}, burn type ${a.typeId}`,
      );
    }
    if (token.amount !== a.value) {
      throw new BlockProcessorError(
        "INVALID_BURN",
        `invalid burn: token amount ${token.amount}, burn value ${a.value}`,
      );
    }

    this.storage.saveToken({
      ...token,
      burned: true,
      counter: token.counter + 1n,
      txHash: ctx.txHash,
    });
  }

  private join(payload: PayloadOf<"joinFT">, ctx: TxContext): void {
    const joined = this.fungible(payload.unitId);
    if (joined.burned) {
      throw new BlockProcessorError("INVALID_JOIN", `token ${joined.id} is burned`);
    }

    const seen = new Set<Hex>();
    let sum = 0n;

    for (const burnProof of payload.attributes.burnTokenTransactions) {
      const burnPayload = burnProof.txRecord.transactionOrder.payload;
      if (burnPayload.type !== "burnFT") {
        throw new BlockProcessorError(
          "INVALID_JOIN",
          `expected burn transaction, got ${burnPayload.type}`,
        );
      }
      if (!verifyTxProof(burnProof)) {
        throw new BlockProcessorError(
          "INVALID_JOIN",
          `invalid burn proof for token ${burnPayload.unitId}`,
        );
      }
      if (seen.has(burnPayload.unitId)) {
        throw new BlockProcessorError(
          "INVALID_JOIN",
          `token ${burnPayload.unitId} is joined more than once`,
        );
      }
      seen.add(burnPayload.unitId);

      const burned = this.fungible(burnPayload.unitId);
      const b = burnPayload.attributes;

      if (!burned.burned) {
        throw new BlockProcessorError("INVALID_JOIN", `token ${burned.id} is not burned`);
      }
      if (burned.owner !== joined.owner) {
        throw new BlockProcessorError(
          "INVALID_JOIN",
          `burned token ${burned.id} has a different owner than joined token ${joined.id}`,
        );
      }
      if (burned.typeId !== joined.typeId) {
        throw new BlockProcessorError(
          "INVALID_JOIN",
          `burned token ${burned.id} type ${burned.typeId} differs from ${joined.typeId}`,
        );
      }
      if (b.targetTokenId !== joined.id) {
        throw new BlockProcessorError(
          "INVALID_JOIN",
          `burn of ${burned.id} targets ${b.targetTokenId}, not ${joined.id}`,
        );
      }
      if (b.targetTokenCounter !== joined.counter) {
        throw new BlockProcessorError(
          "INVALID_JOIN",
          `burn of ${burned.id} targets counter ${b.targetTokenCounter}, token is at ${joined.counter}`,
        );
      }

      sum += burned.amount;
      if (joined.amount + sum > MAX_UINT64) {
        throw new BlockProcessorError("INVALID_JOIN", "joined value overflows uint64");
      }
    }

    this.storage.saveToken({
      ...joined,
      amount: joined.amount + sum,
      counter: joined.counter + 1n,
      txHash: ctx.txHash,
      lockStatus: 0,
    });
    for (const id of seen) {
      this.storage.removeToken(id);
    }
  }

  // ─── Update / Lock / Unlock ─────────────────────────────────────────

  private updateNonFungible(payload: PayloadOf<"updateNFT">, ctx: TxContext): void {
    const token = this.unlocked(this.nonFungible(payload.unitId));
    this.storage.saveToken({
      ...token,
      nftData: payload.attributes.data,
      counter: token.counter + 1n,
      txHash: ctx.txHash,
    });
  }

  private lockToken(payload: PayloadOf<"lockToken">, ctx: TxContext): void {
    const token = this.token(payload.unitId);
    if (token.lockStatus !== 0) {
      throw new BlockProcessorError("INVALID_TRANSACTION", `token ${token.id} is already locked`);
    }
    this.storage.saveToken({
      ...token,
      lockStatus: payload.attributes.lockStatus,
      counter: token.counter + 1n,
      txHash: ctx.txHash,
    });
  }

  private unlockToken(payload: PayloadOf<"unlockToken">, ctx: TxContext): void {
    const token = this.token(payload.unitId);
    if (token.lockStatus === 0) {
      throw new BlockProcessorError("INVALID_TRANSACTION", `token ${token.id} is already unlocked`);
    }
    this.storage.saveToken({
      ...token,
      lockStatus: 0,
      counter: token.counter + 1n,
      txHash: ctx.txHash,
    });
  }

  // ─── Fee Credit ─────────────────────────────────────────────────────

  private addFeeCredit(payload: PayloadOf<"addFC">, ctx: TxContext): void {
    const a = payload.attributes;
    const bill = this.storage.getFeeCreditBill(payload.unitId);
    const balance = (bill?.balance ?? 0n) + a.transferAmount - a.transferFee - ctx.fee;
    if (balance < 0n) {
      throw new BlockProcessorError(
        "NEGATIVE_BALANCE",
        `fee credit bill ${payload.unitId} would have negative balance ${balance}`,
      );
    }
    this.storage.saveFeeCreditBill({
      id: payload.unitId,
      balance,
      lockStatus: bill?.lockStatus ?? 0,
      counter: bill === undefined ? 0n : bill.counter + 1n,
      ownerPredicate: a.feeCreditOwnerPredicate,
      txHash: ctx.txHash,
    });
  }

  private closeFeeCredit(payload: PayloadOf<"closeFC">, ctx: TxContext): void {
    const bill = this.feeCreditBill(payload.unitId);
    this.saveBill(bill, bill.balance - payload.attributes.amount, bill.lockStatus, ctx);
  }

  private lockFeeCredit(payload: PayloadOf<"lockFC">, ctx: TxContext): void {
    const bill = this.feeCreditBill(payload.unitId);
    this.saveBill(bill, bill.balance - ctx.fee, payload.attributes.lockStatus, ctx);
  }

  private unlockFeeCredit(payload: PayloadOf<"unlockFC">, ctx: TxContext): void {
    const bill = this.feeCreditBill(payload.unitId);
    this.saveBill(bill, bill.balance - ctx.fee, 0, ctx);
  }

  private saveBill(bill: FeeCreditBill, balance: bigint, lockStatus: number, ctx: TxContext): void {
    if (balance < 0n) {
      throw new BlockProcessorError(
        "NEGATIVE_BALANCE",
        `fee credit bill ${bill.id} would have negative balance ${balance}`,
      );
    }
    this.storage.saveFeeCreditBill({
      ...bill,
      balance,
      lockStatus,
      counter: bill.counter + 1n,
      txHash: ctx.txHash,
    });
  }

  /** Deduct a token transaction's fee. Does not touch the bill's counter. */
  private chargeFee(id: Hex, fee: bigint): void {
    const bill = this.feeCreditBill(id);
    if (bill.balance < fee) {
      throw new BlockProcessorError(
        "NEGATIVE_BALANCE",
        `fee credit bill ${id} balance ${bill.balance} is less than fee ${fee}`,
      );
    }
    this.storage.saveFeeCreditBill({ ...bill, balance: bill.balance - fee });
  }

  // ─── Lookups ────────────────────────────────────────────────────────

  private feeCreditBill(id: Hex): FeeCreditBill {
    const bill = this.storage.getFeeCreditBill(id);
    if (bill === undefined) {
      throw new BlockProcessorError("FEE_CREDIT_BILL_NOT_FOUND", `fee credit bill not found: ${id}`);
    }
    return bill;
  }

  private token(id: Hex): TokenUnit {
    const token = this.storage.getToken(id);
    if (token === undefined) {
      throw new BlockProcessorError("TOKEN_NOT_FOUND", `token ${id} not found`);
    }
    return token;
  }

  private fungible(id: Hex): FungibleTokenUnit {
    const token = this.token(id);
    if (token.kind !== "fungible") {
      throw new BlockProcessorError("INVALID_TRANSACTION", `token ${id} is not fungible`);
    }
    return token;
  }

  private nonFungible(id: Hex): NonFungibleTokenUnit {
    const token = this.token(id);
    if (token.kind !== "nft") {
      throw new BlockProcessorError("INVALID_TRANSACTION", `token ${id} is not a non-fungible token`);
    }
    return token;
  }

  private unlocked<T extends TokenUnit>(token: T): T {
    if (token.lockStatus !== 0) {
      throw new BlockProcessorError("INVALID_TRANSACTION", `token ${token.id} is locked`);
    }
    return token;
  }
}

/** Public key that signed the fee proof, when it is a P2PKH proof. */
function creatorOf(order: TransactionOrder): Hex | null {
  if (order.feeProof === null || !isHex(order.feeProof)) {
    return null;
  }
  const decoded = decodeP2pkhProof(fromHex(order.feeProof));
  return decoded === undefined ? null : toHex(decoded.publicKey);
}
