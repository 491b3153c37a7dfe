/**
 * secp256k1 account keys and P2PKH proof verification.
 */

import { secp256k1 } from "@noble/curves/secp256k1";
import type { AccountKey, AccountKeyProvider } from "@tokenwallet/types";
import { bytesEqual, concatBytes, sha256 } from "@tokenwallet/types";
import { PredicateError } from "./errors.js";
import { decodeP2pkhProof, extractP2pkhHash } from "./templates.js";

/**
 * Build an account key from a raw 32-byte private key.
 *
 * Messages are hashed with SHA-256 before signing; the signature is the
 * 64-byte compact form followed by the recovery byte.
 */
export function createAccountKey(accountNumber: number, privateKey: Uint8Array): AccountKey {
  const publicKey = secp256k1.getPublicKey(privateKey, true);
  return {
    accountNumber,
    publicKey,
    pubKeyHash: sha256(publicKey),
    sign(message: Uint8Array): Uint8Array {
      const signature = secp256k1.sign(sha256(message), privateKey);
      return concatBytes(signature.toCompactRawBytes(), Uint8Array.of(signature.recovery));
    },
  };
}

/**
 * Check that `proof` satisfies the P2PKH `predicate` over `sigBytes`.
 * Returns false for non-P2PKH predicates and malformed proofs.
 */
export function verifyP2pkhProof(
  predicate: Uint8Array,
  proof: Uint8Array,
  sigBytes: Uint8Array,
): boolean {
  const expectedHash = extractP2pkhHash(predicate);
  const decoded = decodeP2pkhProof(proof);
  if (expectedHash === undefined || decoded === undefined) return false;
  if (!bytesEqual(sha256(decoded.publicKey), expectedHash)) return false;
  return secp256k1.verify(decoded.signature.subarray(0, 64), sha256(sigBytes), decoded.publicKey);
}

/**
 * Account keys held in memory, numbered from 1 in the order given.
 */
export class StaticAccountKeyProvider implements AccountKeyProvider {
  private readonly keys: readonly AccountKey[];

  constructor(privateKeys: readonly Uint8Array[]) {
    this.keys = privateKeys.map((key, i) => createAccountKey(i + 1, key));
  }

  async getAccountKey(accountNumber: number): Promise<AccountKey> {
    if (!Number.isInteger(accountNumber) || accountNumber < 1) {
      throw new PredicateError(
        "INVALID_ACCOUNT_NUMBER",
        `invalid account number: ${accountNumber}`,
      );
    }
    const key = this.keys[accountNumber - 1];
    if (key === undefined) {
      throw new PredicateError("ACCOUNT_NOT_FOUND", `account key ${accountNumber} not found`);
    }
    return key;
  }

  async getAccountKeys(): Promise<readonly AccountKey[]> {
    return this.keys;
  }
}
