/**
 * @tokenwallet/predicates — Predicate clause and argument parsing.
 *
 * Clause grammar (what a unit's predicate must satisfy):
 *
 *   ""  | "true"          always-true
 *   "false"               always-false
 *   "ptpkh"               P2PKH bound to the acting account
 *   "ptpkh:<n>"           P2PKH bound to account n (n >= 1)
 *   "ptpkh:0x<hash>"      P2PKH with an explicit public key hash
 *   "0x<hex>"             raw predicate bytes
 *   "@<path>"             raw predicate bytes read from a file
 *
 * Argument grammar (what satisfies a clause):
 *
 *   "" | "empty" | "true" | "false"   empty argument
 *   "ptpkh" | "ptpkh:<n>"             signature by account n (lazy)
 *   "0x<hex>"                         raw argument bytes
 *   "@<path>"                         raw argument bytes read from a file
 */

import { readFile } from "node:fs/promises";
import type { AccountKey, AccountKeyProvider } from "@tokenwallet/types";
import { fromHex, isHex } from "@tokenwallet/types";
import { PredicateError } from "./errors.js";
import {
  ALWAYS_FALSE_BYTES,
  ALWAYS_TRUE_BYTES,
  encodeP2pkhProof,
  p2pkhPredicate,
} from "./templates.js";

const PTPKH = "ptpkh";
const PTPKH_PREFIX = "ptpkh:";
const HEX_PREFIX = "0x";
const FILE_PREFIX = "@";
const ACCOUNT_NUMBER_PATTERN = /^-?\d+$/;

// =============================================================================
// Predicate inputs
// =============================================================================

/**
 * A resolved predicate argument.
 *
 * `argument` carries literal bytes (possibly empty); `account` signs the
 * transaction's signing bytes with the account key when the proof is
 * requested.
 */
export type PredicateInput =
  | { readonly kind: "argument"; readonly argument: Uint8Array }
  | { readonly kind: "account"; readonly accountKey: AccountKey };

export function argumentInput(argument: Uint8Array): PredicateInput {
  return { kind: "argument", argument };
}

export function accountInput(accountKey: AccountKey): PredicateInput {
  return { kind: "account", accountKey };
}

/** Produce the proof bytes for `input` over `sigBytes`. */
export function predicateProof(input: PredicateInput, sigBytes: Uint8Array): Uint8Array {
  switch (input.kind) {
    case "argument":
      return input.argument;
    case "account":
      return encodeP2pkhProof(input.accountKey.sign(sigBytes), input.accountKey.publicKey);
  }
}

/** Proofs for a sequence of inputs, in order. */
export function predicateProofs(
  inputs: readonly PredicateInput[],
  sigBytes: Uint8Array,
): Uint8Array[] {
  return inputs.map((input) => predicateProof(input, sigBytes));
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Decode a `0x`-prefixed hex literal. "0x" alone decodes to empty bytes.
 * Returns undefined when the remainder is not hex.
 */
function decodeHexLiteral(value: string): Uint8Array | undefined {
  const hex = value.slice(HEX_PREFIX.length).toLowerCase();
  if (!isHex(hex)) return undefined;
  return fromHex(hex);
}

function parseAccountNumber(value: string, source: string): number | undefined {
  if (!ACCOUNT_NUMBER_PATTERN.test(value)) return undefined;
  const n = Number(value);
  if (!Number.isSafeInteger(n) || n < 1) {
    throw new PredicateError(
      "INVALID_ACCOUNT_NUMBER",
      `invalid key number: ${value} in "${source}"`,
    );
  }
  return n;
}

async function readPredicateFile(path: string): Promise<Uint8Array> {
  const contents = await readFile(path);
  return new Uint8Array(contents);
}

// =============================================================================
// Clauses
// =============================================================================

/**
 * Parse a predicate clause into predicate bytes.
 *
 * @param accountNumber - the acting account, used by a bare "ptpkh"
 * @throws {PredicateError} on unrecognized syntax or an account number below 1
 */
export async function parsePredicateClause(
  clause: string,
  accountNumber: number,
  keys: AccountKeyProvider,
): Promise<Uint8Array> {
  if (clause === "" || clause === "true") {
    return ALWAYS_TRUE_BYTES;
  }
  if (clause === "false") {
    return ALWAYS_FALSE_BYTES;
  }
  if (clause.startsWith(FILE_PREFIX)) {
    return readPredicateFile(clause.slice(FILE_PREFIX.length));
  }
  if (clause.startsWith(HEX_PREFIX)) {
    const bytes = decodeHexLiteral(clause);
    if (bytes === undefined) {
      throw new PredicateError("INVALID_CLAUSE", `invalid predicate clause: "${clause}"`);
    }
    return bytes;
  }

  if (clause === PTPKH) {
    const key = await keys.getAccountKey(accountNumber);
    return p2pkhPredicate(key.pubKeyHash);
  }

  if (clause.startsWith(PTPKH_PREFIX)) {
    const target = clause.slice(PTPKH_PREFIX.length);

    if (target.startsWith(HEX_PREFIX)) {
      const hash = decodeHexLiteral(target);
      if (hash === undefined || hash.length === 0) {
        throw new PredicateError("INVALID_CLAUSE", `invalid predicate clause: "${clause}"`);
      }
      return p2pkhPredicate(hash);
    }

    const n = parseAccountNumber(target, clause);
    if (n !== undefined) {
      const key = await keys.getAccountKey(n);
      return p2pkhPredicate(key.pubKeyHash);
    }
  }

  throw new PredicateError("INVALID_CLAUSE", `invalid predicate clause: "${clause}"`);
}

// =============================================================================
// Arguments
// =============================================================================

/**
 * Parse a predicate argument.
 *
 * Account references resolve their key here; the signature itself is
 * computed later by {@link predicateProof}.
 *
 * @throws {PredicateError} on unrecognized syntax or an account number below 1
 */
export async function parsePredicateArgument(
  argument: string,
  accountNumber: number,
  keys: AccountKeyProvider,
): Promise<PredicateInput> {
  if (argument === "" || argument === "empty" || argument === "true" || argument === "false") {
    return argumentInput(new Uint8Array(0));
  }
  if (argument.startsWith(FILE_PREFIX)) {
    return argumentInput(await readPredicateFile(argument.slice(FILE_PREFIX.length)));
  }
  if (argument.startsWith(HEX_PREFIX)) {
    const bytes = decodeHexLiteral(argument);
    if (bytes === undefined) {
      throw new PredicateError("INVALID_ARGUMENT", `invalid predicate argument: "${argument}"`);
    }
    return argumentInput(bytes);
  }

  if (argument === PTPKH) {
    return accountInput(await keys.getAccountKey(accountNumber));
  }

  if (argument.startsWith(PTPKH_PREFIX)) {
    const n = parseAccountNumber(argument.slice(PTPKH_PREFIX.length), argument);
    if (n !== undefined) {
      return accountInput(await keys.getAccountKey(n));
    }
  }

  throw new PredicateError("INVALID_ARGUMENT", `invalid predicate argument: "${argument}"`);
}

/** Parse several arguments in order, e.g. one per type level. */
export async function parsePredicateArguments(
  args: readonly string[],
  accountNumber: number,
  keys: AccountKeyProvider,
): Promise<PredicateInput[]> {
  const inputs: PredicateInput[] = [];
  for (const arg of args) {
    inputs.push(await parsePredicateArgument(arg, accountNumber, keys));
  }
  return inputs;
}
