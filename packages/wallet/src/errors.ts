/**
 * @tokenwallet/wallet — Errors.
 */

/** Error codes for wallet operations. */
export type WalletErrorCode =
  | "NO_FEE_CREDIT"
  | "INSUFFICIENT_FEE_CREDIT"
  | "FEE_CREDIT_LOCKED"
  | "INSUFFICIENT_TOKENS"
  | "TOKEN_LOCKED"
  | "TOKEN_NOT_LOCKED"
  | "INVALID_AMOUNT"
  | "INVALID_TYPE_ID"
  | "DECIMALS_MISMATCH"
  | "TYPE_NOT_FOUND"
  | "TOKEN_NOT_FOUND"
  | "INVALID_NFT_FIELD"
  | "NOT_TOKEN_OWNER"
  | "VALUE_OVERFLOW";

/**
 * Validation or precondition failure, raised before anything is sent.
 * Never retried automatically.
 */
export class WalletError extends Error {
  public readonly code: WalletErrorCode;

  constructor(code: WalletErrorCode, message: string) {
    super(message);
    this.name = "WalletError";
    this.code = code;
  }
}
