/**
 * @tokenwallet/block-processor — Errors.
 */

/** Error codes for block application. */
export type BlockProcessorErrorCode =
  | "INVALID_BLOCK_ORDER"
  | "FEE_CREDIT_BILL_NOT_FOUND"
  | "NEGATIVE_BALANCE"
  | "TOKEN_NOT_FOUND"
  | "TYPE_NOT_FOUND"
  | "INVALID_SPLIT"
  | "INVALID_BURN"
  | "INVALID_JOIN"
  | "INVALID_TRANSACTION";

/**
 * Error thrown while applying a block. Always fatal to the block:
 * storage is rolled back and the block can be retried unmodified.
 */
export class BlockProcessorError extends Error {
  public readonly code: BlockProcessorErrorCode;

  constructor(code: BlockProcessorErrorCode, message: string) {
    super(message);
    this.name = "BlockProcessorError";
    this.code = code;
  }
}
