/**
 * Predicate templates.
 *
 * Predicates are CBOR arrays `[tag, templateId, params]`. The wallet only
 * ever needs three built-in templates, so their encodings are fixed
 * byte layouts rather than going through a general CBOR encoder:
 *
 *   always-false  83 00 41 00 f6
 *   always-true   83 00 41 01 f6
 *   P2PKH         83 00 41 02 58 20 <32-byte public key hash>
 *
 * A P2PKH proof is `[signature, publicKey]`:
 *
 *   82 58 41 <65-byte signature> 58 21 <33-byte compressed public key>
 */

import { bytesEqual, concatBytes } from "@tokenwallet/types";

export const P2PKH_HASH_LENGTH = 32;
export const SIGNATURE_LENGTH = 65;
export const PUBLIC_KEY_LENGTH = 33;

export const ALWAYS_FALSE_BYTES: Uint8Array = Uint8Array.of(0x83, 0x00, 0x41, 0x00, 0xf6);
export const ALWAYS_TRUE_BYTES: Uint8Array = Uint8Array.of(0x83, 0x00, 0x41, 0x01, 0xf6);

const P2PKH_PREFIX = Uint8Array.of(0x83, 0x00, 0x41, 0x02, 0x58, P2PKH_HASH_LENGTH);
const PROOF_SIG_PREFIX = Uint8Array.of(0x82, 0x58, SIGNATURE_LENGTH);
const PROOF_KEY_PREFIX = Uint8Array.of(0x58, PUBLIC_KEY_LENGTH);

/**
 * Pay-to-public-key-hash predicate.
 *
 * The hash is embedded as given; callers passing an explicit hash are
 * trusted to pass a SHA-256 digest.
 */
export function p2pkhPredicate(pubKeyHash: Uint8Array): Uint8Array {
  if (pubKeyHash.length > 0xff) {
    throw new RangeError("public key hash too long");
  }
  const prefix = Uint8Array.from(P2PKH_PREFIX);
  prefix[5] = pubKeyHash.length;
  return concatBytes(prefix, pubKeyHash);
}

/** The public key hash of a P2PKH predicate, or undefined for any other predicate. */
export function extractP2pkhHash(predicate: Uint8Array): Uint8Array | undefined {
  if (predicate.length !== P2PKH_PREFIX.length + P2PKH_HASH_LENGTH) return undefined;
  if (!bytesEqual(predicate.subarray(0, P2PKH_PREFIX.length), P2PKH_PREFIX)) {
    return undefined;
  }
  return predicate.subarray(P2PKH_PREFIX.length);
}

export function isP2pkhPredicate(predicate: Uint8Array): boolean {
  return extractP2pkhHash(predicate) !== undefined;
}

export function encodeP2pkhProof(signature: Uint8Array, publicKey: Uint8Array): Uint8Array {
  if (signature.length !== SIGNATURE_LENGTH) {
    throw new RangeError(`signature must be ${SIGNATURE_LENGTH} bytes, got ${signature.length}`);
  }
  if (publicKey.length !== PUBLIC_KEY_LENGTH) {
    throw new RangeError(`public key must be ${PUBLIC_KEY_LENGTH} bytes, got ${publicKey.length}`);
  }
  return concatBytes(PROOF_SIG_PREFIX, signature, PROOF_KEY_PREFIX, publicKey);
}

export interface P2pkhProof {
  readonly signature: Uint8Array;
  readonly publicKey: Uint8Array;
}

export function decodeP2pkhProof(proof: Uint8Array): P2pkhProof | undefined {
  const expected =
    PROOF_SIG_PREFIX.length + SIGNATURE_LENGTH + PROOF_KEY_PREFIX.length + PUBLIC_KEY_LENGTH;
  if (proof.length !== expected) return undefined;

  const keyPrefixAt = PROOF_SIG_PREFIX.length + SIGNATURE_LENGTH;
  if (
    !bytesEqual(proof.subarray(0, PROOF_SIG_PREFIX.length), PROOF_SIG_PREFIX) ||
    !bytesEqual(proof.subarray(keyPrefixAt, keyPrefixAt + PROOF_KEY_PREFIX.length), PROOF_KEY_PREFIX)
  ) {
    return undefined;
  }

  return {
    signature: proof.slice(PROOF_SIG_PREFIX.length, keyPrefixAt),
    publicKey: proof.slice(keyPrefixAt + PROOF_KEY_PREFIX.length),
  };
}
