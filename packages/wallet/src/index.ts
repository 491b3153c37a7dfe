/**
 * @tokenwallet/wallet — Token wallet service.
 *
 * - Unit selection and dust grouping (pure)
 * - Payload construction and signing
 * - Fee credit gate over the RpcClient
 * - TokenWallet: define, mint, send, lock, update and collect dust
 */

// Errors
export { WalletError } from "./errors.js";
export type { WalletErrorCode } from "./errors.js";

// Configuration and results
export {
  ALL_ACCOUNTS,
  DEFAULT_TIMEOUT_ROUNDS,
  MAX_BURN_BATCH_SIZE,
  MAX_UINT64,
  NFT_NAME_MAX_BYTES,
  NFT_URI_MAX_BYTES,
  NFT_DATA_MAX_BYTES,
} from "./types.js";
export type {
  TokenWalletConfig,
  TokenWalletDeps,
  NewFungibleTypeParams,
  NewNonFungibleTypeParams,
  NewFungibleTokenParams,
  NewNonFungibleTokenParams,
  AuthOptions,
  DefineOptions,
  MintOptions,
  UpdateOptions,
  SubmissionResult,
  DustCollectionResult,
  AccountDustResult,
  AccountTokens,
} from "./types.js";

// Selection
export {
  isSpendable,
  candidateTokens,
  saturatingSum,
  closestMatch,
  selectTokens,
  dustGroups,
  toBatches,
  dustTxCount,
} from "./selector.js";
export type { SelectionPlan } from "./selector.js";

// Building
export {
  validateTypeId,
  validateAmount,
  validateNftFields,
  validateNftData,
  defineFungibleType,
  defineNonFungibleType,
  mintFungible,
  mintNonFungible,
  transferFungible,
  transferNonFungible,
  splitFungible,
  splitOrTransfer,
  burnFungible,
  joinFungible,
  updateNonFungible,
  lockTokenPayload,
  unlockTokenPayload,
  proofHex,
  proofsHex,
  signOrder,
} from "./builder.js";
export type { OrderContext, AuthProofBuilder } from "./builder.js";

// Fee credit
export { RpcFeeManager } from "./fee-manager.js";

// Service
export { TokenWallet, ownerPredicateOf, receiverPredicate } from "./token-wallet.js";
