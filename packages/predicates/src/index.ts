/**
 * @tokenwallet/predicates — Predicate clauses, arguments and proofs.
 */

// Errors
export { PredicateError } from "./errors.js";
export type { PredicateErrorCode } from "./errors.js";

// Templates
export {
  ALWAYS_TRUE_BYTES,
  ALWAYS_FALSE_BYTES,
  P2PKH_HASH_LENGTH,
  SIGNATURE_LENGTH,
  PUBLIC_KEY_LENGTH,
  p2pkhPredicate,
  extractP2pkhHash,
  isP2pkhPredicate,
  encodeP2pkhProof,
  decodeP2pkhProof,
} from "./templates.js";
export type { P2pkhProof } from "./templates.js";

// Keys
export { createAccountKey, verifyP2pkhProof, StaticAccountKeyProvider } from "./keys.js";

// Resolver
export {
  argumentInput,
  accountInput,
  predicateProof,
  predicateProofs,
  parsePredicateClause,
  parsePredicateArgument,
  parsePredicateArguments,
} from "./resolver.js";
export type { PredicateInput } from "./resolver.js";
