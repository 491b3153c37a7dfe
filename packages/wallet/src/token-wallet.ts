/**
 * @tokenwallet/wallet — TokenWallet.
 *
 * The user-facing API. Every submitting operation follows the same
 * sequence:
 *
 * 1. Validate inputs locally (amounts, IDs, NFT fields)
 * 2. Check ledger preconditions through the RpcClient (ownership, locks)
 * 3. Reserve fee credit through the FeeManager
 * 4. Build, sign and submit
 *
 * Multi-step operations (multi-unit send, dust collection) confirm each
 * step before building the next, since later steps reference the state
 * left by earlier ones.
 */

import { randomBytes } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import {
  ALWAYS_TRUE_BYTES,
  accountInput,
  argumentInput,
  isP2pkhPredicate,
  p2pkhPredicate,
} from "@tokenwallet/predicates";
import type { PredicateInput } from "@tokenwallet/predicates";
import { DEFAULT_POLL_INTERVAL_MS, SubmissionError, TxSubmissionBatch } from "@tokenwallet/submitter";
import type { SleepFn, TxSubmission } from "@tokenwallet/submitter";
import type {
  AccountKey,
  AccountKeyProvider,
  FeeManager,
  FungibleTokenUnit,
  Hex,
  NonFungibleTokenUnit,
  Payload,
  RpcClient,
  TokenKindFilter,
  TokenTypeUnit,
  TokenUnit,
  TransactionOrder,
  TxRecordProof,
} from "@tokenwallet/types";
import { LockReason, UnitTag, fromHex, randomUnitId, sha256, toHex } from "@tokenwallet/types";
import {
  burnFungible,
  defineFungibleType,
  defineNonFungibleType,
  joinFungible,
  lockTokenPayload,
  mintFungible,
  mintNonFungible,
  proofHex,
  proofsHex,
  signOrder,
  splitOrTransfer,
  transferNonFungible,
  unlockTokenPayload,
  updateNonFungible,
  validateAmount,
  validateNftData,
  validateNftFields,
  validateTypeId,
} from "./builder.js";
import type { OrderContext } from "./builder.js";
import { WalletError } from "./errors.js";
import { dustGroups, dustTxCount, selectTokens, toBatches } from "./selector.js";
import type { SelectionPlan } from "./selector.js";
import { ALL_ACCOUNTS, DEFAULT_TIMEOUT_ROUNDS, MAX_UINT64 } from "./types.js";
import type {
  AccountDustResult,
  AccountTokens,
  AuthOptions,
  DefineOptions,
  DustCollectionResult,
  MintOptions,
  NewFungibleTokenParams,
  NewFungibleTypeParams,
  NewNonFungibleTokenParams,
  NewNonFungibleTypeParams,
  SubmissionResult,
  TokenWalletConfig,
  TokenWalletDeps,
  UpdateOptions,
} from "./types.js";

const EMPTY_ARGUMENT = new Uint8Array(0);

/** Owner predicate of an account: P2PKH over its public key hash. */
export function ownerPredicateOf(key: AccountKey): Hex {
  return toHex(p2pkhPredicate(key.pubKeyHash));
}

/** Predicate locking value to `receiverPubKey`; always-true when null. */
export function receiverPredicate(receiverPubKey: Uint8Array | null): Hex {
  if (receiverPubKey === null) {
    return toHex(ALWAYS_TRUE_BYTES);
  }
  return toHex(p2pkhPredicate(sha256(receiverPubKey)));
}

function feeSum(submissions: readonly TxSubmission[]): bigint {
  let sum = 0n;
  for (const sub of submissions) {
    if (sub.proof !== null) sum += sub.proof.txRecord.serverMetadata.actualFee;
  }
  return sum;
}

function randomNonce(): bigint {
  return BigInt(`0x${randomBytes(8).toString("hex")}`);
}

interface ResolvedAuth {
  readonly ownerInput: PredicateInput;
  readonly typeInputs: readonly PredicateInput[];
  readonly signal: AbortSignal | undefined;
}

export class TokenWallet {
  private readonly rpc: RpcClient;
  private readonly keys: AccountKeyProvider;
  private readonly feeManager: FeeManager;
  private readonly logger: Logger;
  private readonly sleepFn: SleepFn | undefined;

  readonly networkId: number;
  readonly partitionId: number;
  private readonly maxFee: bigint;
  private readonly timeoutRounds: bigint;
  private readonly pollIntervalMs: number;
  private readonly confirm: boolean;

  constructor(config: TokenWalletConfig, deps: TokenWalletDeps) {
    this.networkId = config.networkId;
    this.partitionId = config.partitionId;
    this.maxFee = config.maxFee;
    this.timeoutRounds = config.timeoutRounds ?? DEFAULT_TIMEOUT_ROUNDS;
    this.pollIntervalMs = config.confirmPollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.confirm = config.confirm ?? true;

    this.rpc = deps.rpc;
    this.keys = deps.keys;
    this.feeManager = deps.feeManager;
    this.logger = deps.logger ?? pino({ level: "silent" });
    this.sleepFn = deps.sleepFn;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  async getRoundNumber(): Promise<bigint> {
    return this.rpc.getRoundNumber();
  }

  /** Tokens owned by one account, or by every account for {@link ALL_ACCOUNTS}. */
  async listTokens(
    kind: TokenKindFilter,
    accountNumber: number = ALL_ACCOUNTS,
  ): Promise<AccountTokens<TokenUnit>[]> {
    const result: AccountTokens<TokenUnit>[] = [];
    for (const key of await this.accountKeys(accountNumber)) {
      const items = await this.rpc.getTokens(kind, ownerPredicateOf(key));
      result.push({ accountNumber: key.accountNumber, items });
    }
    return result;
  }

  /** Token types created by the selected accounts. */
  async listTokenTypes(
    kind: TokenKindFilter,
    accountNumber: number = ALL_ACCOUNTS,
  ): Promise<TokenTypeUnit[]> {
    const types: TokenTypeUnit[] = [];
    for (const key of await this.accountKeys(accountNumber)) {
      types.push(...(await this.rpc.getTokenTypes(kind, toHex(key.publicKey))));
    }
    return types;
  }

  async getTokenType(id: Hex): Promise<TokenTypeUnit | null> {
    const hierarchy = await this.rpc.getTypeHierarchy(id);
    return hierarchy.find((t) => t.id === id) ?? null;
  }

  async getToken(id: Hex): Promise<TokenUnit | null> {
    return this.rpc.getToken(id);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Token types
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Define a fungible token type. A sub-type must use its parent's
   * decimal places and carry one sub-type creation proof per parent level.
   */
  async newFungibleType(
    accountNumber: number,
    params: NewFungibleTypeParams,
    options: DefineOptions = {},
  ): Promise<SubmissionResult> {
    const id = params.id ?? randomUnitId(UnitTag.FungibleTokenType);
    validateTypeId(id, UnitTag.FungibleTokenType);

    const parentTypeId = params.parentTypeId ?? null;
    if (parentTypeId !== null) {
      const parent = await this.requireType(parentTypeId);
      if (parent.kind !== "fungible") {
        throw new WalletError("TYPE_NOT_FOUND", `fungible token type ${parentTypeId} not found`);
      }
      if (parent.decimalPlaces !== params.decimalPlaces) {
        throw new WalletError(
          "DECIMALS_MISMATCH",
          `parent type requires ${parent.decimalPlaces} decimal places, got ${params.decimalPlaces}`,
        );
      }
    }

    const key = await this.keys.getAccountKey(accountNumber);
    const ctx = await this.orderContext(await this.feeManager.ensureFeeCredit(accountNumber, 1));
    const inputs = options.subTypeCreationInputs ?? (await this.defaultTypeInputs(parentTypeId));

    const payload = defineFungibleType(ctx, id, {
      symbol: params.symbol,
      name: params.name,
      icon: params.icon ?? null,
      parentTypeId,
      decimalPlaces: params.decimalPlaces,
      subTypeCreationPredicate: params.subTypeCreationPredicate,
      tokenMintingPredicate: params.tokenMintingPredicate,
      tokenTypeOwnerPredicate: params.tokenTypeOwnerPredicate,
    });
    const tx = signOrder(payload, (sig) => ({ subTypeCreationProofs: proofsHex(inputs, sig) }), key);

    this.logger.info({ typeId: id, accountNumber }, "creating fungible token type");
    return this.submit(accountNumber, [tx], this.confirm, options.signal);
  }

  async newNonFungibleType(
    accountNumber: number,
    params: NewNonFungibleTypeParams,
    options: DefineOptions = {},
  ): Promise<SubmissionResult> {
    const id = params.id ?? randomUnitId(UnitTag.NonFungibleTokenType);
    validateTypeId(id, UnitTag.NonFungibleTokenType);

    const parentTypeId = params.parentTypeId ?? null;
    if (parentTypeId !== null) {
      const parent = await this.requireType(parentTypeId);
      if (parent.kind !== "nft") {
        throw new WalletError("TYPE_NOT_FOUND", `non-fungible token type ${parentTypeId} not found`);
      }
    }

    const key = await this.keys.getAccountKey(accountNumber);
    const ctx = await this.orderContext(await this.feeManager.ensureFeeCredit(accountNumber, 1));
    const inputs = options.subTypeCreationInputs ?? (await this.defaultTypeInputs(parentTypeId));

    const payload = defineNonFungibleType(ctx, id, {
      symbol: params.symbol,
      name: params.name,
      icon: params.icon ?? null,
      parentTypeId,
      subTypeCreationPredicate: params.subTypeCreationPredicate,
      tokenMintingPredicate: params.tokenMintingPredicate,
      tokenTypeOwnerPredicate: params.tokenTypeOwnerPredicate,
      dataUpdatePredicate: params.dataUpdatePredicate,
    });
    const tx = signOrder(payload, (sig) => ({ subTypeCreationProofs: proofsHex(inputs, sig) }), key);

    this.logger.info({ typeId: id, accountNumber }, "creating non-fungible token type");
    return this.submit(accountNumber, [tx], this.confirm, options.signal);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Minting
  // ───────────────────────────────────────────────────────────────────────

  async newFungibleToken(
    accountNumber: number,
    params: NewFungibleTokenParams,
    options: MintOptions = {},
  ): Promise<SubmissionResult> {
    validateAmount(params.value);
    const type = await this.requireType(params.typeId);
    if (type.kind !== "fungible") {
      throw new WalletError("TYPE_NOT_FOUND", `fungible token type ${params.typeId} not found`);
    }

    const key = await this.keys.getAccountKey(accountNumber);
    const ctx = await this.orderContext(await this.feeManager.ensureFeeCredit(accountNumber, 1));
    const mintInput = options.mintInput ?? accountInput(key);

    const payload = mintFungible(ctx, {
      typeId: params.typeId,
      ownerPredicate: params.ownerPredicate ?? ownerPredicateOf(key),
      value: params.value,
      nonce: params.nonce ?? randomNonce(),
    });
    const tx = signOrder(payload, (sig) => ({ tokenMintingProof: proofHex(mintInput, sig) }), key);

    this.logger.info({ tokenId: payload.unitId, typeId: params.typeId }, "minting fungible token");
    return this.submit(accountNumber, [tx], this.confirm, options.signal);
  }

  async newNFT(
    accountNumber: number,
    params: NewNonFungibleTokenParams,
    options: MintOptions = {},
  ): Promise<SubmissionResult> {
    validateNftFields(params);
    const type = await this.requireType(params.typeId);
    if (type.kind !== "nft") {
      throw new WalletError("TYPE_NOT_FOUND", `non-fungible token type ${params.typeId} not found`);
    }

    const key = await this.keys.getAccountKey(accountNumber);
    const ctx = await this.orderContext(await this.feeManager.ensureFeeCredit(accountNumber, 1));
    const mintInput = options.mintInput ?? accountInput(key);

    const payload = mintNonFungible(ctx, {
      typeId: params.typeId,
      ownerPredicate: params.ownerPredicate ?? ownerPredicateOf(key),
      name: params.name,
      uri: params.uri,
      data: params.data,
      dataUpdatePredicate: params.dataUpdatePredicate,
      nonce: params.nonce ?? randomNonce(),
    });
    const tx = signOrder(payload, (sig) => ({ tokenMintingProof: proofHex(mintInput, sig) }), key);

    this.logger.info({ tokenId: payload.unitId, typeId: params.typeId }, "minting NFT");
    return this.submit(accountNumber, [tx], this.confirm, options.signal);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Transfers
  // ───────────────────────────────────────────────────────────────────────

  async transferNFT(
    accountNumber: number,
    tokenId: Hex,
    receiverPubKey: Uint8Array | null,
    options: AuthOptions = {},
  ): Promise<SubmissionResult> {
    const key = await this.keys.getAccountKey(accountNumber);
    const token = await this.requireNonFungible(tokenId);
    this.ensureOwnership(key, token, options.ownerInput);
    this.ensureUnlocked(token);

    const auth = await this.resolveAuth(key, token.typeId, options);
    const ctx = await this.orderContext(await this.feeManager.ensureFeeCredit(accountNumber, 1));
    const tx = this.signTokenOrder(
      transferNonFungible(ctx, token, receiverPredicate(receiverPubKey)),
      key,
      auth,
    );

    this.logger.info({ tokenId, accountNumber }, "transferring NFT");
    return this.submit(accountNumber, [tx], this.confirm, auth.signal);
  }

  /**
   * Send `amount` of a fungible type. Uses a single split or transfer when
   * one unit covers the amount; otherwise locks the largest unit, burns
   * the others into it, joins, and sends from the joined unit. Overshoot
   * stays on the sender's joined unit.
   *
   * @throws {WalletError} INSUFFICIENT_TOKENS when the spendable units do
   *   not cover `amount`
   * @throws {SubmissionError} TRANSACTION_FAILED when a confirmed step failed
   */
  async sendFungible(
    accountNumber: number,
    typeId: Hex,
    amount: bigint,
    receiverPubKey: Uint8Array | null,
    options: AuthOptions = {},
  ): Promise<SubmissionResult> {
    validateAmount(amount);
    validateTypeId(typeId, UnitTag.FungibleTokenType);

    const key = await this.keys.getAccountKey(accountNumber);
    const tokens = await this.rpc.getTokens("fungible", ownerPredicateOf(key));
    const plan = selectTokens(tokens, typeId, amount);
    const auth = await this.resolveAuth(key, typeId, options);
    const receiver = receiverPredicate(receiverPubKey);

    if (plan.kind === "multi") {
      return this.sendMultiple(key, plan, amount, receiver, auth);
    }

    const ctx = await this.orderContext(await this.feeManager.ensureFeeCredit(accountNumber, 1));
    const tx = this.signTokenOrder(splitOrTransfer(ctx, plan.token, amount, receiver), key, auth);

    this.logger.info(
      { tokenId: plan.token.id, amount: amount.toString(), action: plan.action },
      "sending fungible tokens",
    );
    const result = await this.submit(accountNumber, [tx], this.confirm, auth.signal);
    this.assertSucceeded(result.submissions);
    return result;
  }

  /**
   * Send `amount` from one chosen unit: transfer when the amounts match,
   * split otherwise.
   */
  async sendFungibleById(
    accountNumber: number,
    tokenId: Hex,
    amount: bigint,
    receiverPubKey: Uint8Array | null,
    options: AuthOptions = {},
  ): Promise<SubmissionResult> {
    validateAmount(amount);

    const key = await this.keys.getAccountKey(accountNumber);
    const token = await this.requireFungible(tokenId);
    this.ensureOwnership(key, token, options.ownerInput);
    this.ensureUnlocked(token);
    if (amount > token.amount) {
      throw new WalletError(
        "INSUFFICIENT_TOKENS",
        `insufficient FT value: got ${token.amount}, need ${amount}`,
      );
    }

    const auth = await this.resolveAuth(key, token.typeId, options);
    const ctx = await this.orderContext(await this.feeManager.ensureFeeCredit(accountNumber, 1));
    const tx = this.signTokenOrder(
      splitOrTransfer(ctx, token, amount, receiverPredicate(receiverPubKey)),
      key,
      auth,
    );

    this.logger.info({ tokenId, amount: amount.toString() }, "sending fungible token by ID");
    const result = await this.submit(accountNumber, [tx], this.confirm, auth.signal);
    this.assertSucceeded(result.submissions);
    return result;
  }

  private async sendMultiple(
    key: AccountKey,
    plan: Extract<SelectionPlan, { kind: "multi" }>,
    amount: bigint,
    receiver: Hex,
    auth: ResolvedAuth,
  ): Promise<SubmissionResult> {
    if (plan.total > MAX_UINT64) {
      throw new WalletError("VALUE_OVERFLOW", `joined value ${plan.total} overflows uint64`);
    }

    const accountNumber = key.accountNumber;
    // lock + burns + join + final split or transfer
    const fcrId = await this.feeManager.ensureFeeCredit(accountNumber, plan.burns.length + 3);
    this.logger.info(
      {
        targetTokenId: plan.target.id,
        burns: plan.burns.length,
        amount: amount.toString(),
        total: plan.total.toString(),
      },
      "sending fungible tokens from multiple units",
    );

    const submissions: TxSubmission[] = [];
    const { target, steps } = await this.lockBurnJoin(key, fcrId, plan.target, plan.burns, auth);
    submissions.push(...steps);

    const ctx = await this.orderContext(fcrId);
    const finalTx = this.signTokenOrder(splitOrTransfer(ctx, target, amount, receiver), key, auth);
    const final = await this.sendBatch([finalTx], this.confirm, auth.signal);
    this.assertSucceeded(final);
    submissions.push(...final);

    return { accountNumber, submissions, feeSum: feeSum(submissions) };
  }

  // ───────────────────────────────────────────────────────────────────────
  // NFT data, locks
  // ───────────────────────────────────────────────────────────────────────

  async updateNFTData(
    accountNumber: number,
    tokenId: Hex,
    data: Hex,
    options: UpdateOptions = {},
  ): Promise<SubmissionResult> {
    validateNftData(data);

    const key = await this.keys.getAccountKey(accountNumber);
    const token = await this.requireNonFungible(tokenId);
    this.ensureUnlocked(token);

    const dataUpdateInput = options.dataUpdateInput ?? argumentInput(EMPTY_ARGUMENT);
    const typeInputs = options.typeDataUpdateInputs ?? (await this.defaultTypeInputs(token.typeId));
    const ctx = await this.orderContext(await this.feeManager.ensureFeeCredit(accountNumber, 1));

    const tx = signOrder(
      updateNonFungible(ctx, token, data),
      (sig) => ({
        tokenDataUpdateProof: proofHex(dataUpdateInput, sig),
        tokenTypeDataUpdateProofs: proofsHex(typeInputs, sig),
      }),
      key,
    );

    this.logger.info({ tokenId, accountNumber }, "updating NFT data");
    return this.submit(accountNumber, [tx], this.confirm, options.signal);
  }

  async lockToken(
    accountNumber: number,
    tokenId: Hex,
    options: AuthOptions = {},
  ): Promise<SubmissionResult> {
    const key = await this.keys.getAccountKey(accountNumber);
    const token = await this.requireToken(tokenId);
    this.ensureOwnership(key, token, options.ownerInput);
    if (token.lockStatus !== 0) {
      throw new WalletError("TOKEN_LOCKED", "token is already locked");
    }

    const ownerInput = options.ownerInput ?? accountInput(key);
    const ctx = await this.orderContext(await this.feeManager.ensureFeeCredit(accountNumber, 1));
    const tx = signOrder(
      lockTokenPayload(ctx, token, LockReason.Manual),
      (sig) => ({ ownerProof: proofHex(ownerInput, sig) }),
      key,
    );

    this.logger.info({ tokenId, accountNumber }, "locking token");
    return this.submit(accountNumber, [tx], this.confirm, options.signal);
  }

  async unlockToken(
    accountNumber: number,
    tokenId: Hex,
    options: AuthOptions = {},
  ): Promise<SubmissionResult> {
    const key = await this.keys.getAccountKey(accountNumber);
    const token = await this.requireToken(tokenId);
    this.ensureOwnership(key, token, options.ownerInput);
    if (token.lockStatus === 0) {
      throw new WalletError("TOKEN_NOT_LOCKED", "token is already unlocked");
    }

    const ownerInput = options.ownerInput ?? accountInput(key);
    const ctx = await this.orderContext(await this.feeManager.ensureFeeCredit(accountNumber, 1));
    const tx = signOrder(
      unlockTokenPayload(ctx, token),
      (sig) => ({ ownerProof: proofHex(ownerInput, sig) }),
      key,
    );

    this.logger.info({ tokenId, accountNumber }, "unlocking token");
    return this.submit(accountNumber, [tx], this.confirm, options.signal);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Dust collection
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Join each account's spendable fungible tokens into one unit per type.
   * Types with fewer than two tokens are left alone. A type whose joined
   * value would overflow is skipped with a warning.
   */
  async collectDust(
    accountNumber: number = ALL_ACCOUNTS,
    allowedTypeIds: readonly Hex[] = [],
    options: AuthOptions = {},
  ): Promise<AccountDustResult[]> {
    const results: AccountDustResult[] = [];

    for (const key of await this.accountKeys(accountNumber)) {
      const tokens = await this.rpc.getTokens("fungible", ownerPredicateOf(key));
      const typeResults: DustCollectionResult[] = [];

      for (const [typeId, group] of dustGroups(tokens, allowedTypeIds)) {
        const result = await this.collectDustOfType(key, typeId, group, options);
        if (result !== undefined) typeResults.push(result);
      }

      results.push({ accountNumber: key.accountNumber, results: typeResults });
    }
    return results;
  }

  private async collectDustOfType(
    key: AccountKey,
    typeId: Hex,
    group: readonly FungibleTokenUnit[],
    options: AuthOptions,
  ): Promise<DustCollectionResult | undefined> {
    const [first, ...rest] = group;
    if (first === undefined) return undefined;

    const fcrId = await this.feeManager.ensureFeeCredit(
      key.accountNumber,
      dustTxCount(group.length),
    );
    const auth = await this.resolveAuth(key, typeId, options);

    let target = first;
    const submissions: TxSubmission[] = [];

    for (const batch of toBatches(rest)) {
      let joined = target.amount;
      for (const token of batch) joined += token.amount;
      if (joined > MAX_UINT64) {
        this.logger.warn(
          { typeId, accountNumber: key.accountNumber },
          "unable to join tokens: joined value overflows uint64",
        );
        break;
      }

      const step = await this.lockBurnJoin(key, fcrId, target, batch, auth);
      target = step.target;
      submissions.push(...step.steps);
    }

    if (submissions.length === 0) return undefined;

    this.logger.info(
      { typeId, targetTokenId: first.id, joinedAmount: target.amount.toString() },
      "dust collected",
    );
    return {
      typeId,
      targetTokenId: first.id,
      joinedAmount: target.amount,
      submissions,
      feeSum: feeSum(submissions),
    };
  }

  /**
   * Lock `target` for dust collection, burn `burns` against its post-lock
   * counter, and join the burns into it. Each step is confirmed before the
   * next one is built. Resolves with the expected state of the joined unit.
   */
  private async lockBurnJoin(
    key: AccountKey,
    fcrId: Hex,
    target: FungibleTokenUnit,
    burns: readonly FungibleTokenUnit[],
    auth: ResolvedAuth,
  ): Promise<{ target: FungibleTokenUnit; steps: TxSubmission[] }> {
    const steps: TxSubmission[] = [];

    const lockCtx = await this.orderContext(fcrId);
    const lockTx = signOrder(
      lockTokenPayload(lockCtx, target, LockReason.CollectDust),
      (sig) => ({ ownerProof: proofHex(auth.ownerInput, sig) }),
      key,
    );
    steps.push(...(await this.sendConfirmed([lockTx], auth.signal)));
    const locked: FungibleTokenUnit = {
      ...target,
      lockStatus: LockReason.CollectDust,
      counter: target.counter + 1n,
    };

    const burnCtx = await this.orderContext(fcrId);
    const burnTxs = burns.map((token) =>
      this.signTokenOrder(burnFungible(burnCtx, token, locked.id, locked.counter), key, auth),
    );
    const burned = await this.sendConfirmed(burnTxs, auth.signal);
    steps.push(...burned);

    const joinCtx = await this.orderContext(fcrId);
    const joinTx = this.signTokenOrder(
      joinFungible(joinCtx, locked.id, locked.counter, burned.map((s) => requireProof(s))),
      key,
      auth,
    );
    steps.push(...(await this.sendConfirmed([joinTx], auth.signal)));

    let amount = locked.amount;
    for (const token of burns) amount += token.amount;

    return {
      target: { ...locked, amount, counter: locked.counter + 1n, lockStatus: 0 },
      steps,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private async accountKeys(accountNumber: number): Promise<readonly AccountKey[]> {
    if (accountNumber === ALL_ACCOUNTS) {
      return this.keys.getAccountKeys();
    }
    return [await this.keys.getAccountKey(accountNumber)];
  }

  private async orderContext(feeCreditRecordId: Hex): Promise<OrderContext> {
    const round = await this.rpc.getRoundNumber();
    return {
      networkId: this.networkId,
      partitionId: this.partitionId,
      timeout: round + this.timeoutRounds,
      maxFee: this.maxFee,
      feeCreditRecordId,
    };
  }

  /** One empty argument per level of the type's hierarchy. */
  private async defaultTypeInputs(typeId: Hex | null): Promise<PredicateInput[]> {
    if (typeId === null) return [];
    const hierarchy = await this.rpc.getTypeHierarchy(typeId);
    return hierarchy.map(() => argumentInput(EMPTY_ARGUMENT));
  }

  private async resolveAuth(
    key: AccountKey,
    typeId: Hex,
    options: AuthOptions,
  ): Promise<ResolvedAuth> {
    return {
      ownerInput: options.ownerInput ?? accountInput(key),
      typeInputs: options.typeOwnerInputs ?? (await this.defaultTypeInputs(typeId)),
      signal: options.signal,
    };
  }

  /** Sign a token order with an owner proof and one type owner proof per level. */
  private signTokenOrder(payload: Payload, key: AccountKey, auth: ResolvedAuth): TransactionOrder {
    return signOrder(
      payload,
      (sig) => ({
        ownerProof: proofHex(auth.ownerInput, sig),
        tokenTypeOwnerProofs: proofsHex(auth.typeInputs, sig),
      }),
      key,
    );
  }

  private async requireType(id: Hex): Promise<TokenTypeUnit> {
    const type = await this.getTokenType(id);
    if (type === null) {
      throw new WalletError("TYPE_NOT_FOUND", `token type ${id} not found`);
    }
    return type;
  }

  private async requireToken(id: Hex): Promise<TokenUnit> {
    const token = await this.rpc.getToken(id);
    if (token === null) {
      throw new WalletError("TOKEN_NOT_FOUND", `token not found: ${id}`);
    }
    return token;
  }

  private async requireFungible(id: Hex): Promise<FungibleTokenUnit> {
    const token = await this.requireToken(id);
    if (token.kind !== "fungible") {
      throw new WalletError("TOKEN_NOT_FOUND", `fungible token not found: ${id}`);
    }
    return token;
  }

  private async requireNonFungible(id: Hex): Promise<NonFungibleTokenUnit> {
    const token = await this.requireToken(id);
    if (token.kind !== "nft") {
      throw new WalletError("TOKEN_NOT_FOUND", `non-fungible token not found: ${id}`);
    }
    return token;
  }

  /**
   * The token must be P2PKH-owned by `key`, or carry a custom owner
   * predicate the caller supplies an explicit argument for.
   */
  private ensureOwnership(
    key: AccountKey,
    token: TokenUnit,
    ownerInput: PredicateInput | undefined,
  ): void {
    if (token.owner === ownerPredicateOf(key)) return;
    if (!isP2pkhPredicate(fromHex(token.owner)) && ownerInput?.kind === "argument") return;
    throw new WalletError(
      "NOT_TOKEN_OWNER",
      `token '${token.id}' does not belong to account #${key.accountNumber}`,
    );
  }

  private ensureUnlocked(token: TokenUnit): void {
    if (token.lockStatus !== 0) {
      throw new WalletError("TOKEN_LOCKED", "token is locked");
    }
  }

  private assertSucceeded(submissions: readonly TxSubmission[]): void {
    const failed = submissions.filter((s) => s.confirmed() && !s.succeeded());
    if (failed.length > 0) {
      throw new SubmissionError(
        "TRANSACTION_FAILED",
        `transaction ${failed.map((s) => s.txHash).join(", ")} failed`,
      );
    }
  }

  private async sendBatch(
    txs: readonly TransactionOrder[],
    confirm: boolean,
    signal: AbortSignal | undefined,
  ): Promise<TxSubmission[]> {
    const batch = new TxSubmissionBatch(this.rpc, {
      logger: this.logger,
      pollIntervalMs: this.pollIntervalMs,
      sleepFn: this.sleepFn,
    });
    const submissions = txs.map((tx) => batch.add(tx));
    await batch.sendTx({ confirm, signal });
    return submissions;
  }

  /** Send and wait for proofs; every transaction must succeed. */
  private async sendConfirmed(
    txs: readonly TransactionOrder[],
    signal: AbortSignal | undefined,
  ): Promise<TxSubmission[]> {
    const submissions = await this.sendBatch(txs, true, signal);
    this.assertSucceeded(submissions);
    return submissions;
  }

  private async submit(
    accountNumber: number,
    txs: readonly TransactionOrder[],
    confirm: boolean,
    signal: AbortSignal | undefined,
  ): Promise<SubmissionResult> {
    const submissions = await this.sendBatch(txs, confirm, signal);
    return { accountNumber, submissions, feeSum: feeSum(submissions) };
  }
}

function requireProof(submission: TxSubmission): TxRecordProof {
  const proof = submission.proof;
  if (proof === null) {
    throw new SubmissionError(
      "TRANSACTION_TIMED_OUT",
      `transaction ${submission.txHash} is not confirmed`,
      [submission.txHash],
    );
  }
  return proof;
}
