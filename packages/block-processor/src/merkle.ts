/**
 * @tokenwallet/block-processor — Merkle tree over block records.
 *
 * Binary hash tree whose leaves are record hashes, used to give every
 * processed transaction a self-contained inclusion proof.
 *
 * - Internal nodes: SHA-256(left || right), concatenation of hex strings
 * - Odd node count: the last node is paired with itself
 * - Single leaf: the leaf is the root
 */

import { createHash } from "node:crypto";
import type { Hex, MerkleProofStep, TxRecordProof } from "@tokenwallet/types";
import { blockHeaderHash, transactionRecordHash } from "@tokenwallet/types";

function hashPair(left: Hex, right: Hex): Hex {
  return createHash("sha256").update(left + right).digest("hex");
}

export interface MerklePath {
  readonly leafHash: Hex;
  readonly leafIndex: number;
  readonly siblings: readonly MerkleProofStep[];
  readonly root: Hex;
}

/**
 * Immutable tree. All levels are kept so proofs are read without
 * rehashing.
 */
export class MerkleTree {
  private readonly levels: readonly (readonly Hex[])[];

  private constructor(leaves: readonly Hex[]) {
    const levels: Hex[][] = [[...leaves]];
    let current = levels[0]!;
    while (current.length > 1) {
      const next: Hex[] = [];
      for (let i = 0; i < current.length; i += 2) {
        const left = current[i]!;
        const right = i + 1 < current.length ? current[i + 1]! : left;
        next.push(hashPair(left, right));
      }
      levels.push(next);
      current = next;
    }
    this.levels = levels;
  }

  static build(leaves: readonly Hex[]): MerkleTree {
    return new MerkleTree(leaves);
  }

  /** Null for an empty tree. */
  getRoot(): Hex | null {
    const top = this.levels[this.levels.length - 1]!;
    return top.length === 1 ? top[0]! : null;
  }

  getLeafCount(): number {
    return this.levels[0]!.length;
  }

  /** Inclusion path for a leaf, or null when the index is out of range. */
  getProof(leafIndex: number): MerklePath | null {
    const root = this.getRoot();
    const leaves = this.levels[0]!;
    if (root === null || leafIndex < 0 || leafIndex >= leaves.length) {
      return null;
    }

    const siblings: MerkleProofStep[] = [];
    let index = leafIndex;
    for (let level = 0; level < this.levels.length - 1; level++) {
      const nodes = this.levels[level]!;
      const isLeft = index % 2 === 0;
      const siblingIndex = isLeft ? index + 1 : index - 1;
      const sibling = siblingIndex < nodes.length ? nodes[siblingIndex]! : nodes[index]!;
      siblings.push({ hash: sibling, direction: isLeft ? "right" : "left" });
      index = Math.floor(index / 2);
    }

    return { leafHash: leaves[leafIndex]!, leafIndex, siblings, root };
  }

  /** Fold a leaf through its siblings. */
  static computeRoot(leafHash: Hex, siblings: readonly MerkleProofStep[]): Hex {
    let current = leafHash;
    for (const step of siblings) {
      current =
        step.direction === "left" ? hashPair(step.hash, current) : hashPair(current, step.hash);
    }
    return current;
  }
}

/**
 * Check that a record proof is internally consistent: the record hashes
 * up to the proof's tx root, and the header hash commits to that root.
 */
export function verifyTxProof(proof: TxRecordProof): boolean {
  const { txProof } = proof;
  const root = MerkleTree.computeRoot(transactionRecordHash(proof.txRecord), txProof.siblings);
  if (root !== txProof.txRoot) {
    return false;
  }
  const header = {
    partitionId: txProof.partitionId,
    round: txProof.round,
    previousBlockHash: txProof.previousBlockHash,
  };
  return blockHeaderHash(header, root) === txProof.blockHeaderHash;
}
