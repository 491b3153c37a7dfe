/**
 * Transaction Types
 *
 * Transaction orders, records, inclusion proofs and blocks.
 *
 * An order's payload is discriminated on `type`; the attribute shape
 * for each type lives in {@link TxAttributesMap}.
 */

import type { Hex } from "./hex.js";
import type { TokenIcon } from "./tokens.js";

export const TxType = {
  DefineFungibleType: "defineFT",
  DefineNonFungibleType: "defineNFT",
  MintFungible: "mintFT",
  MintNonFungible: "mintNFT",
  TransferFungible: "transFT",
  TransferNonFungible: "transNFT",
  SplitFungible: "splitFT",
  BurnFungible: "burnFT",
  JoinFungible: "joinFT",
  UpdateNonFungible: "updateNFT",
  LockToken: "lockToken",
  UnlockToken: "unlockToken",
  AddFeeCredit: "addFC",
  CloseFeeCredit: "closeFC",
  LockFeeCredit: "lockFC",
  UnlockFeeCredit: "unlockFC",
} as const;

export type TxType = (typeof TxType)[keyof typeof TxType];

// ─── Attributes ──────────────────────────────────────────────────────────

export interface DefineFungibleTypeAttributes {
  readonly symbol: string;
  readonly name: string;
  readonly icon: TokenIcon | null;
  readonly parentTypeId: Hex | null;
  readonly decimalPlaces: number;
  readonly subTypeCreationPredicate: Hex;
  readonly tokenMintingPredicate: Hex;
  readonly tokenTypeOwnerPredicate: Hex;
}

export interface DefineNonFungibleTypeAttributes {
  readonly symbol: string;
  readonly name: string;
  readonly icon: TokenIcon | null;
  readonly parentTypeId: Hex | null;
  readonly subTypeCreationPredicate: Hex;
  readonly tokenMintingPredicate: Hex;
  readonly tokenTypeOwnerPredicate: Hex;
  readonly dataUpdatePredicate: Hex;
}

export interface MintFungibleAttributes {
  readonly typeId: Hex;
  readonly ownerPredicate: Hex;
  readonly value: bigint;
  readonly nonce: bigint;
}

export interface MintNonFungibleAttributes {
  readonly typeId: Hex;
  readonly ownerPredicate: Hex;
  readonly name: string;
  readonly uri: string;
  readonly data: Hex;
  readonly dataUpdatePredicate: Hex;
  readonly nonce: bigint;
}

export interface TransferFungibleAttributes {
  readonly typeId: Hex;
  readonly newOwnerPredicate: Hex;
  readonly value: bigint;
  readonly counter: bigint;
}

export interface TransferNonFungibleAttributes {
  readonly typeId: Hex;
  readonly newOwnerPredicate: Hex;
  readonly counter: bigint;
}

export interface SplitFungibleAttributes {
  readonly typeId: Hex;
  readonly newOwnerPredicate: Hex;
  readonly targetValue: bigint;
  readonly remainingValue: bigint;
  readonly counter: bigint;
}

export interface BurnFungibleAttributes {
  readonly typeId: Hex;
  readonly value: bigint;
  /** The unit the burned value will be joined into. */
  readonly targetTokenId: Hex;
  /** Counter of the target unit the join is expected to carry. */
  readonly targetTokenCounter: bigint;
  readonly counter: bigint;
}

export interface JoinFungibleAttributes {
  /** Confirmed burn records with their inclusion proofs, ordered by unit ID. */
  readonly burnTokenTransactions: readonly TxRecordProof[];
  readonly counter: bigint;
}

export interface UpdateNonFungibleAttributes {
  readonly data: Hex;
  readonly counter: bigint;
}

export interface LockTokenAttributes {
  readonly lockStatus: number;
  readonly counter: bigint;
}

export interface UnlockTokenAttributes {
  readonly counter: bigint;
}

export interface AddFeeCreditAttributes {
  readonly feeCreditOwnerPredicate: Hex;
  /** Amount moved in from the money partition. */
  readonly transferAmount: bigint;
  /** Fee already paid for the transfer on the money partition. */
  readonly transferFee: bigint;
  readonly transferTxHash: Hex;
}

export interface CloseFeeCreditAttributes {
  readonly amount: bigint;
  readonly targetUnitId: Hex;
  readonly counter: bigint;
}

export interface LockFeeCreditAttributes {
  readonly lockStatus: number;
  readonly counter: bigint;
}

export interface UnlockFeeCreditAttributes {
  readonly counter: bigint;
}

export interface TxAttributesMap {
  readonly defineFT: DefineFungibleTypeAttributes;
  readonly defineNFT: DefineNonFungibleTypeAttributes;
  readonly mintFT: MintFungibleAttributes;
  readonly mintNFT: MintNonFungibleAttributes;
  readonly transFT: TransferFungibleAttributes;
  readonly transNFT: TransferNonFungibleAttributes;
  readonly splitFT: SplitFungibleAttributes;
  readonly burnFT: BurnFungibleAttributes;
  readonly joinFT: JoinFungibleAttributes;
  readonly updateNFT: UpdateNonFungibleAttributes;
  readonly lockToken: LockTokenAttributes;
  readonly unlockToken: UnlockTokenAttributes;
  readonly addFC: AddFeeCreditAttributes;
  readonly closeFC: CloseFeeCreditAttributes;
  readonly lockFC: LockFeeCreditAttributes;
  readonly unlockFC: UnlockFeeCreditAttributes;
}

// ─── Orders ──────────────────────────────────────────────────────────────

export interface ClientMetadata {
  /** Last round in which the order may be executed. */
  readonly timeout: bigint;
  readonly maxTransactionFee: bigint;
  readonly feeCreditRecordId: Hex | null;
}

export interface PayloadOf<T extends TxType> {
  readonly networkId: number;
  readonly partitionId: number;
  readonly unitId: Hex;
  readonly type: T;
  readonly attributes: TxAttributesMap[T];
  readonly clientMetadata: ClientMetadata;
}

/** Payload union, discriminated on `type`. */
export type Payload = { [T in TxType]: PayloadOf<T> }[TxType];

/**
 * Authorization proofs. Which fields are set depends on the transaction
 * type; none of them are part of the bytes they sign.
 */
export interface AuthProof {
  readonly ownerProof?: Hex;
  /** One proof per type level, from the type itself up to its root. */
  readonly tokenTypeOwnerProofs?: readonly Hex[];
  /** One proof per parent type level, from the parent up to the root. */
  readonly subTypeCreationProofs?: readonly Hex[];
  readonly tokenMintingProof?: Hex;
  readonly tokenDataUpdateProof?: Hex;
  /** One proof per type level, from the type itself up to its root. */
  readonly tokenTypeDataUpdateProofs?: readonly Hex[];
}

export interface TransactionOrder<P extends Payload = Payload> {
  readonly payload: P;
  readonly stateUnlock: Hex | null;
  readonly authProof: AuthProof;
  readonly feeProof: Hex | null;
}

// ─── Records, Proofs, Blocks ─────────────────────────────────────────────

export type TxStatus = "successful" | "failed";

export interface ServerMetadata {
  readonly actualFee: bigint;
  readonly successIndicator: TxStatus;
}

export interface TransactionRecord {
  readonly transactionOrder: TransactionOrder;
  readonly serverMetadata: ServerMetadata;
}

export interface MerkleProofStep {
  readonly hash: Hex;
  /** Side the sibling sits on relative to the running hash. */
  readonly direction: "left" | "right";
}

/** Inclusion proof of one record in a block. */
export interface TxProof {
  readonly partitionId: number;
  readonly round: bigint;
  readonly previousBlockHash: Hex | null;
  readonly txRoot: Hex;
  readonly blockHeaderHash: Hex;
  readonly leafIndex: number;
  readonly siblings: readonly MerkleProofStep[];
}

export interface TxRecordProof {
  readonly txRecord: TransactionRecord;
  readonly txProof: TxProof;
}

export interface BlockHeader {
  readonly partitionId: number;
  readonly round: bigint;
  readonly previousBlockHash: Hex | null;
}

export interface Block {
  readonly header: BlockHeader;
  readonly transactions: readonly TransactionRecord[];
}
