/**
 * @tokenwallet/wallet — Configuration and result types.
 */

import type { Logger } from "pino";
import type { PredicateInput } from "@tokenwallet/predicates";
import type { SleepFn, TxSubmission } from "@tokenwallet/submitter";
import type {
  AccountKeyProvider,
  FeeManager,
  Hex,
  RpcClient,
  TokenIcon,
} from "@tokenwallet/types";

/** Account number that selects every account of the key provider. */
export const ALL_ACCOUNTS = 0;

export const DEFAULT_TIMEOUT_ROUNDS = 10n;

export const MAX_BURN_BATCH_SIZE = 100;

export const MAX_UINT64 = (1n << 64n) - 1n;

export const NFT_NAME_MAX_BYTES = 256;
export const NFT_URI_MAX_BYTES = 4 * 1024;
export const NFT_DATA_MAX_BYTES = 64 * 1024;

// ─── Configuration ───────────────────────────────────────────────────────

export interface TokenWalletConfig {
  readonly networkId: number;
  readonly partitionId: number;
  /** Max fee per transaction; also the fee credit reserved per transaction. */
  readonly maxFee: bigint;
  /** Rounds from the current round until a transaction times out. Default: 10 */
  readonly timeoutRounds?: bigint | undefined;
  /** Delay between confirmation polls. Default: 500 */
  readonly confirmPollIntervalMs?: number | undefined;
  /** Wait for proofs of single-step operations. Default: true */
  readonly confirm?: boolean | undefined;
}

export interface TokenWalletDeps {
  readonly rpc: RpcClient;
  readonly keys: AccountKeyProvider;
  readonly feeManager: FeeManager;
  readonly logger?: Logger | undefined;
  /** Sleep between confirmation polls (injectable for testing). */
  readonly sleepFn?: SleepFn | undefined;
}

// ─── Operation inputs ────────────────────────────────────────────────────

interface NewTypeParams {
  /** Generated when omitted. */
  readonly id?: Hex | undefined;
  readonly symbol: string;
  readonly name: string;
  readonly icon?: TokenIcon | null | undefined;
  readonly parentTypeId?: Hex | null | undefined;
  readonly subTypeCreationPredicate: Hex;
  readonly tokenMintingPredicate: Hex;
  readonly tokenTypeOwnerPredicate: Hex;
}

export interface NewFungibleTypeParams extends NewTypeParams {
  readonly decimalPlaces: number;
}

export interface NewNonFungibleTypeParams extends NewTypeParams {
  readonly dataUpdatePredicate: Hex;
}

export interface NewFungibleTokenParams {
  readonly typeId: Hex;
  readonly value: bigint;
  /** Defaults to the account's P2PKH predicate. */
  readonly ownerPredicate?: Hex | undefined;
  readonly nonce?: bigint | undefined;
}

export interface NewNonFungibleTokenParams {
  readonly typeId: Hex;
  readonly name: string;
  readonly uri: string;
  readonly data: Hex;
  readonly dataUpdatePredicate: Hex;
  /** Defaults to the account's P2PKH predicate. */
  readonly ownerPredicate?: Hex | undefined;
  readonly nonce?: bigint | undefined;
}

/**
 * Predicate inputs shared by token operations. Type-level inputs run
 * from the type itself up to its root; when omitted, every level gets an
 * empty argument.
 */
export interface AuthOptions {
  /** Satisfies the token's owner predicate. Default: the acting account's signature. */
  readonly ownerInput?: PredicateInput | undefined;
  readonly typeOwnerInputs?: readonly PredicateInput[] | undefined;
  /** Cancels confirmation waits. */
  readonly signal?: AbortSignal | undefined;
}

export interface DefineOptions {
  /** One per parent type level, from the parent up to the root. */
  readonly subTypeCreationInputs?: readonly PredicateInput[] | undefined;
  readonly signal?: AbortSignal | undefined;
}

export interface MintOptions {
  /** Satisfies the type's minting predicate. Default: the acting account's signature. */
  readonly mintInput?: PredicateInput | undefined;
  readonly signal?: AbortSignal | undefined;
}

export interface UpdateOptions {
  readonly dataUpdateInput?: PredicateInput | undefined;
  /** One per type level, from the type itself up to its root. */
  readonly typeDataUpdateInputs?: readonly PredicateInput[] | undefined;
  readonly signal?: AbortSignal | undefined;
}

// ─── Results ─────────────────────────────────────────────────────────────

export interface SubmissionResult {
  readonly accountNumber: number;
  readonly submissions: readonly TxSubmission[];
  /** Sum of actual fees of the confirmed submissions. */
  readonly feeSum: bigint;
}

export interface DustCollectionResult {
  readonly typeId: Hex;
  /** Token every batch was joined into. */
  readonly targetTokenId: Hex;
  readonly joinedAmount: bigint;
  readonly submissions: readonly TxSubmission[];
  readonly feeSum: bigint;
}

export interface AccountDustResult {
  readonly accountNumber: number;
  readonly results: readonly DustCollectionResult[];
}

export interface AccountTokens<T> {
  readonly accountNumber: number;
  readonly items: readonly T[];
}
