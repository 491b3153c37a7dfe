/**
 * @tokenwallet/predicates — Errors.
 */

/** Error codes for predicate parsing and key resolution. */
export type PredicateErrorCode =
  | "INVALID_CLAUSE"
  | "INVALID_ARGUMENT"
  | "INVALID_ACCOUNT_NUMBER"
  | "ACCOUNT_NOT_FOUND";

/**
 * Error thrown for malformed predicate clauses or arguments.
 * Always thrown before anything is signed or sent.
 */
export class PredicateError extends Error {
  public readonly code: PredicateErrorCode;

  constructor(code: PredicateErrorCode, message: string) {
    super(message);
    this.name = "PredicateError";
    this.code = code;
  }
}
