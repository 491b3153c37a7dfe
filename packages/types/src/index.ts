/**
 * @tokenwallet/types — Shared domain types for the token wallet stack.
 *
 * Used across all packages:
 * - Hex and unit ID primitives
 * - Token types, token units and fee credit bills
 * - Transaction orders, records, proofs and blocks
 * - Canonical signing bytes and hashes
 * - Capability interfaces (RpcClient, FeeManager, AccountKeyProvider,
 *   BlockSource, TransactionForwarder)
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - Byte strings are lowercase hex, uint64 values are bigint
 */

// Hex
export type { Hex } from "./hex.js";
export { isHex, toHex, fromHex, concatBytes, bytesEqual } from "./hex.js";

// Unit IDs
export {
  UNIT_ID_LENGTH,
  UNIT_PART_LENGTH,
  TYPE_TAG_LENGTH,
  UnitTag,
  newUnitId,
  randomUnitId,
  isUnitId,
  unitTagOf,
  hasUnitTag,
  formatUnitTag,
} from "./unit-id.js";

// Token types
export type {
  TokenKind,
  TokenKindFilter,
  TokenIcon,
  FungibleTokenType,
  NonFungibleTokenType,
  TokenTypeUnit,
  FungibleTokenUnit,
  NonFungibleTokenUnit,
  TokenUnit,
  FeeCreditBill,
} from "./tokens.js";
export { LockReason } from "./tokens.js";

// Transaction types
export type {
  DefineFungibleTypeAttributes,
  DefineNonFungibleTypeAttributes,
  MintFungibleAttributes,
  MintNonFungibleAttributes,
  TransferFungibleAttributes,
  TransferNonFungibleAttributes,
  SplitFungibleAttributes,
  BurnFungibleAttributes,
  JoinFungibleAttributes,
  UpdateNonFungibleAttributes,
  LockTokenAttributes,
  UnlockTokenAttributes,
  AddFeeCreditAttributes,
  CloseFeeCreditAttributes,
  LockFeeCreditAttributes,
  UnlockFeeCreditAttributes,
  TxAttributesMap,
  ClientMetadata,
  PayloadOf,
  Payload,
  AuthProof,
  TransactionOrder,
  TxStatus,
  ServerMetadata,
  TransactionRecord,
  MerkleProofStep,
  TxProof,
  TxRecordProof,
  BlockHeader,
  Block,
} from "./transaction.js";
export { TxType } from "./transaction.js";

// Codec
export type { JsonValue } from "./codec.js";
export {
  toJsonValue,
  canonicalJson,
  canonicalBytes,
  sha256,
  sha256Hex,
  authProofSigBytes,
  feeProofSigBytes,
  transactionHash,
  transactionRecordHash,
  blockHeaderHash,
  mintedTokenId,
  splitTokenId,
  feeCreditRecordIdFor,
} from "./codec.js";

// Capabilities
export type {
  RpcClient,
  FeeManager,
  AccountKey,
  AccountKeyProvider,
  BlockSource,
  TransactionForwarder,
} from "./capabilities.js";

// Runtime type guards
export {
  isTokenKind,
  isTokenKindFilter,
  isTxType,
  isFungibleToken,
  isNonFungibleToken,
  isFungibleType,
  isNonFungibleType,
  matchesKind,
  hasPayloadType,
} from "./guards.js";

// Wire decoding
export {
  hexSchema,
  unitIdSchema,
  uint64Schema,
  txProofSchema,
  txRecordProofSchema,
  payloadSchema,
  transactionOrderSchema,
  transactionRecordSchema,
  blockSchema,
  tokenTypeSchema,
  tokenSchema,
  feeCreditBillSchema,
} from "./wire.js";
