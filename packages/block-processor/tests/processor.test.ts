/**
 * Tests for block application.
 */

import { describe, it, expect } from "vitest";
import { createAccountKey, encodeP2pkhProof } from "@tokenwallet/predicates";
import type { Hex, TransactionOrder, TxRecordProof } from "@tokenwallet/types";
import { splitTokenId, toHex, transactionHash } from "@tokenwallet/types";
import { BlockProcessorError } from "../src/errors.js";
import { InMemoryStorage } from "../src/memory-storage.js";
import { verifyTxProof } from "../src/merkle.js";
import { BlockProcessor } from "../src/processor.js";
import {
  FCR_ID,
  FT_SUBTYPE,
  FT_TYPE,
  NFT_TYPE,
  OTHER_OWNER,
  OWNER,
  addFC,
  block,
  burnFT,
  closeFC,
  defineFT,
  defineNFT,
  joinFT,
  lockFC,
  lockToken,
  mintFT,
  mintNFT,
  record,
  splitFT,
  transFT,
  transNFT,
  unlockToken,
  updateNFT,
  withoutFeeCredit,
} from "./helpers.js";

function funded(amount = 100n) {
  const storage = new InMemoryStorage();
  const processor = new BlockProcessor(storage);
  processor.processBlock(block(1n, [record(addFC(amount))]));
  return { storage, processor };
}

/** Storage with an FT type and one minted token of 1000 in block 2. */
function withToken() {
  const { storage, processor } = funded();
  const mint = mintFT(FT_TYPE, 1000n);
  processor.processBlock(block(2n, [record(defineFT(FT_TYPE)), record(mint)]));
  return { storage, processor, tokenId: mint.payload.unitId };
}

function errorCode(fn: () => void): string | undefined {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof BlockProcessorError) return err.code;
    throw err;
  }
  return undefined;
}

function proofOf(storage: InMemoryStorage, tx: TransactionOrder): TxRecordProof {
  const proof = storage.getTxProof(transactionHash(tx));
  if (proof === undefined) throw new Error("proof not stored");
  return proof;
}

function balance(storage: InMemoryStorage): bigint | undefined {
  return storage.getFeeCreditBill(FCR_ID)?.balance;
}

describe("BlockProcessor ordering", () => {
  it("rejects a block that does not advance the round", () => {
    const storage = new InMemoryStorage();
    const processor = new BlockProcessor(storage);
    processor.processBlock(block(5n, []));

    expect(() => processor.processBlock(block(5n, []))).toThrow(
      "invalid block, received block 5, current wallet block 5",
    );
    expect(errorCode(() => processor.processBlock(block(4n, [])))).toBe("INVALID_BLOCK_ORDER");
  });

  it("rejects round zero on an empty storage", () => {
    const processor = new BlockProcessor(new InMemoryStorage());
    expect(errorCode(() => processor.processBlock(block(0n, [])))).toBe("INVALID_BLOCK_ORDER");
  });

  it("accepts gaps between rounds", () => {
    const storage = new InMemoryStorage();
    const processor = new BlockProcessor(storage);
    processor.processBlock(block(1n, []));
    processor.processBlock(block(7n, []));
    expect(storage.getBlockNumber()).toBe(7n);
  });
});

describe("BlockProcessor fee credit", () => {
  it("creates a bill from addFC net of both fees", () => {
    const { storage } = funded(100n);
    const bill = storage.getFeeCreditBill(FCR_ID);
    expect(bill?.balance).toBe(98n);
    expect(bill?.counter).toBe(0n);
    expect(bill?.ownerPredicate).toBe(OWNER);
  });

  it("tops up an existing bill and advances its counter", () => {
    const { storage, processor } = funded(100n);
    processor.processBlock(block(2n, [record(addFC(50n))]));
    expect(balance(storage)).toBe(146n);
    expect(storage.getFeeCreditBill(FCR_ID)?.counter).toBe(1n);
  });

  it("rejects addFC that leaves a negative balance", () => {
    const processor = new BlockProcessor(new InMemoryStorage());
    expect(errorCode(() => processor.processBlock(block(1n, [record(addFC(1n))])))).toBe(
      "NEGATIVE_BALANCE",
    );
  });

  it("locks the bill and charges the fee", () => {
    const { storage, processor } = funded();
    processor.processBlock(block(2n, [record(lockFC(0n))]));
    const bill = storage.getFeeCreditBill(FCR_ID);
    expect(bill?.balance).toBe(97n);
    expect(bill?.lockStatus).toBe(1);
    expect(bill?.counter).toBe(1n);
  });

  it("closes fee credit by subtracting the amount", () => {
    const { storage, processor } = funded();
    processor.processBlock(block(2n, [record(closeFC(50n, 0n))]));
    expect(balance(storage)).toBe(48n);
  });

  it("charges token transaction fees to the named record", () => {
    const { storage } = withToken();
    expect(balance(storage)).toBe(96n);
  });

  it("requires a fee credit record on token transactions", () => {
    const { processor } = funded();
    const tx = withoutFeeCredit(defineFT(FT_TYPE));
    expect(errorCode(() => processor.processBlock(block(2n, [record(tx)])))).toBe(
      "INVALID_TRANSACTION",
    );
  });

  it("fails when the fee credit record is unknown", () => {
    const processor = new BlockProcessor(new InMemoryStorage());
    expect(errorCode(() => processor.processBlock(block(1n, [record(defineFT(FT_TYPE))])))).toBe(
      "FEE_CREDIT_BILL_NOT_FOUND",
    );
  });

  it("fails when the fee exceeds the balance", () => {
    const { processor } = funded(3n);
    expect(
      errorCode(() => processor.processBlock(block(2n, [record(defineFT(FT_TYPE), 5n)]))),
    ).toBe("NEGATIVE_BALANCE");
  });
});

describe("BlockProcessor token types", () => {
  it("records the fee payer's public key as creator", () => {
    const { storage, processor } = funded();
    const key = createAccountKey(1, new Uint8Array(32).fill(1));
    const feeProof = toHex(encodeP2pkhProof(new Uint8Array(65), key.publicKey));

    processor.processBlock(block(2n, [record(defineFT(FT_TYPE, { feeProof }))]));

    expect(storage.getTokenType(FT_TYPE)?.creator).toBe(toHex(key.publicKey));
    expect(storage.getTokenTypes("fungible", toHex(key.publicKey))).toHaveLength(1);
    expect(storage.getTokenTypes("nft")).toHaveLength(0);
  });

  it("leaves creator empty without a fee proof", () => {
    const { storage, processor } = funded();
    processor.processBlock(block(2n, [record(defineFT(FT_TYPE))]));
    expect(storage.getTokenType(FT_TYPE)?.creator).toBeNull();
  });

  it("defines a sub-type with matching decimal places", () => {
    const { storage, processor } = funded();
    processor.processBlock(
      block(2n, [
        record(defineFT(FT_TYPE)),
        record(defineFT(FT_SUBTYPE, { parentTypeId: FT_TYPE, decimalPlaces: 2 })),
      ]),
    );
    expect(storage.getTokenType(FT_SUBTYPE)?.parentTypeId).toBe(FT_TYPE);
  });

  it("rejects a sub-type with different decimal places", () => {
    const { processor } = funded();
    const b = block(2n, [
      record(defineFT(FT_TYPE)),
      record(defineFT(FT_SUBTYPE, { parentTypeId: FT_TYPE, decimalPlaces: 3 })),
    ]);
    expect(() => processor.processBlock(b)).toThrow(
      "parent type requires 2 decimal places, got 3",
    );
  });

  it("rejects a type ID with the wrong unit tag", () => {
    const { processor } = funded();
    expect(() => processor.processBlock(block(2n, [record(defineFT(NFT_TYPE))]))).toThrow(
      "invalid token type ID: expected unit type is 0x20",
    );
  });

  it("rejects redefining an existing type", () => {
    const { processor } = funded();
    processor.processBlock(block(2n, [record(defineFT(FT_TYPE))]));
    expect(
      errorCode(() => processor.processBlock(block(3n, [record(defineFT(FT_TYPE))]))),
    ).toBe("INVALID_TRANSACTION");
  });
});

describe("BlockProcessor fungible tokens", () => {
  it("mints a token carrying its type's details", () => {
    const { storage, tokenId } = withToken();
    const token = storage.getToken(tokenId);

    expect(token).toMatchObject({
      kind: "fungible",
      typeId: FT_TYPE,
      typeName: "Test Token",
      symbol: "TT",
      owner: OWNER,
      amount: 1000n,
      decimals: 2,
      counter: 0n,
      lockStatus: 0,
      burned: false,
    });
    expect(storage.getBlockNumber()).toBe(2n);
  });

  it("rolls back the whole block when a transaction fails to apply", () => {
    const { storage, processor } = funded();
    const define = defineFT(FT_TYPE);
    const b = block(2n, [record(define), record(mintFT("04".repeat(32) + "20", 5n))]);

    expect(errorCode(() => processor.processBlock(b))).toBe("TYPE_NOT_FOUND");
    expect(storage.getTokenType(FT_TYPE)).toBeUndefined();
    expect(storage.getTxProof(transactionHash(define))).toBeUndefined();
    expect(storage.getBlockNumber()).toBe(1n);
    expect(balance(storage)).toBe(98n);
  });

  it("transfers a token to a new owner", () => {
    const { storage, processor, tokenId } = withToken();
    const tx = transFT(tokenId, FT_TYPE, 1000n, 0n);
    processor.processBlock(block(3n, [record(tx)]));

    const token = storage.getToken(tokenId);
    expect(token?.owner).toBe(OTHER_OWNER);
    expect(token?.counter).toBe(1n);
    expect(token?.txHash).toBe(transactionHash(tx));
    expect(storage.getTokens("all", OWNER)).toHaveLength(0);
  });

  it("splits a token into remaining and target parts", () => {
    const { storage, processor, tokenId } = withToken();
    const tx = splitFT(tokenId, FT_TYPE, 300n, 700n, 0n);
    processor.processBlock(block(3n, [record(tx)]));

    const original = storage.getToken(tokenId);
    expect(original).toMatchObject({ amount: 700n, counter: 1n, owner: OWNER });

    const created = storage.getToken(splitTokenId(tx));
    expect(created).toMatchObject({ amount: 300n, counter: 0n, owner: OTHER_OWNER });
    expect(storage.getTokens("fungible", OTHER_OWNER)).toHaveLength(1);
  });

  it("rejects a split whose parts do not add up", () => {
    const { processor, tokenId } = withToken();
    const tx = splitFT(tokenId, FT_TYPE, 300n, 600n, 0n);
    expect(errorCode(() => processor.processBlock(block(3n, [record(tx)])))).toBe("INVALID_SPLIT");
  });

  it("rejects a burn of a partial amount", () => {
    const { processor, tokenId } = withToken();
    const tx = burnFT(tokenId, FT_TYPE, 999n, "05".repeat(32) + "21", 0n, 0n);
    expect(errorCode(() => processor.processBlock(block(3n, [record(tx)])))).toBe("INVALID_BURN");
  });

  it("only charges the fee for a failed transaction", () => {
    const { storage, processor, tokenId } = withToken();
    const tx = transFT(tokenId, FT_TYPE, 1000n, 0n);
    processor.processBlock(block(3n, [record(tx, 3n, "failed")]));

    expect(storage.getToken(tokenId)?.owner).toBe(OWNER);
    expect(storage.getToken(tokenId)?.counter).toBe(0n);
    expect(balance(storage)).toBe(93n);
    expect(storage.getTxProof(transactionHash(tx))?.txRecord.serverMetadata.successIndicator).toBe(
      "failed",
    );
  });
});

describe("BlockProcessor join", () => {
  function twoTokens() {
    const { storage, processor } = funded();
    const mintA = mintFT(FT_TYPE, 600n, 0n);
    const mintB = mintFT(FT_TYPE, 400n, 1n);
    processor.processBlock(
      block(2n, [record(defineFT(FT_TYPE)), record(mintA), record(mintB)]),
    );
    return { storage, processor, a: mintA.payload.unitId, b: mintB.payload.unitId };
  }

  it("joins burned value into the target token", () => {
    const { storage, processor, a, b } = twoTokens();
    const burn = burnFT(b, FT_TYPE, 400n, a, 0n, 0n);
    processor.processBlock(block(3n, [record(burn)]));
    expect(storage.getToken(b)).toMatchObject({ burned: true, counter: 1n });

    processor.processBlock(block(4n, [record(joinFT(a, [proofOf(storage, burn)], 0n))]));

    expect(storage.getToken(a)).toMatchObject({ amount: 1000n, counter: 1n, lockStatus: 0 });
    expect(storage.getToken(b)).toBeUndefined();
  });

  it("rejects a burn that targets another counter", () => {
    const { storage, processor, a, b } = twoTokens();
    const burn = burnFT(b, FT_TYPE, 400n, a, 5n, 0n);
    processor.processBlock(block(3n, [record(burn)]));

    const join = joinFT(a, [proofOf(storage, burn)], 0n);
    expect(() => processor.processBlock(block(4n, [record(join)]))).toThrow(
      `burn of ${b} targets counter 5, token is at 0`,
    );
  });

  it("rejects a burn proof that does not verify", () => {
    const { storage, processor, a, b } = twoTokens();
    const burn = burnFT(b, FT_TYPE, 400n, a, 0n, 0n);
    processor.processBlock(block(3n, [record(burn)]));

    const proof = proofOf(storage, burn);
    const tampered: TxRecordProof = {
      ...proof,
      txProof: { ...proof.txProof, txRoot: "00".repeat(32) },
    };
    const join = joinFT(a, [tampered], 0n);
    expect(errorCode(() => processor.processBlock(block(4n, [record(join)])))).toBe(
      "INVALID_JOIN",
    );
    expect(storage.getToken(b)?.burned).toBe(true);
  });

  it("rejects the same burn twice", () => {
    const { storage, processor, a, b } = twoTokens();
    const burn = burnFT(b, FT_TYPE, 400n, a, 0n, 0n);
    processor.processBlock(block(3n, [record(burn)]));

    const proof = proofOf(storage, burn);
    expect(() =>
      processor.processBlock(block(4n, [record(joinFT(a, [proof, proof], 0n))])),
    ).toThrow(`token ${b} is joined more than once`);
  });
});

describe("BlockProcessor locks", () => {
  it("locks and unlocks a token", () => {
    const { storage, processor, tokenId } = withToken();
    processor.processBlock(block(3n, [record(lockToken(tokenId, 0n, 2))]));
    expect(storage.getToken(tokenId)).toMatchObject({ lockStatus: 2, counter: 1n });

    processor.processBlock(block(4n, [record(unlockToken(tokenId, 1n))]));
    expect(storage.getToken(tokenId)).toMatchObject({ lockStatus: 0, counter: 2n });

    processor.processBlock(block(5n, [record(transFT(tokenId, FT_TYPE, 1000n, 2n))]));
    expect(storage.getToken(tokenId)).toMatchObject({ owner: OTHER_OWNER, counter: 3n });
  });

  it("rejects locking twice", () => {
    const { processor, tokenId } = withToken();
    processor.processBlock(block(3n, [record(lockToken(tokenId, 0n))]));
    expect(() => processor.processBlock(block(4n, [record(lockToken(tokenId, 1n))]))).toThrow(
      `token ${tokenId} is already locked`,
    );
  });

  it("rejects unlocking an unlocked token", () => {
    const { processor, tokenId } = withToken();
    expect(() => processor.processBlock(block(3n, [record(unlockToken(tokenId, 0n))]))).toThrow(
      `token ${tokenId} is already unlocked`,
    );
  });

  it("rejects transfers of a locked token", () => {
    const { processor, tokenId } = withToken();
    processor.processBlock(block(3n, [record(lockToken(tokenId, 0n))]));
    const tx = transFT(tokenId, FT_TYPE, 1000n, 1n);
    expect(() => processor.processBlock(block(4n, [record(tx)]))).toThrow(
      `token ${tokenId} is locked`,
    );
  });
});

describe("BlockProcessor non-fungible tokens", () => {
  it("mints, updates and transfers an NFT", () => {
    const { storage, processor } = funded();
    const mint = mintNFT(NFT_TYPE);
    const id: Hex = mint.payload.unitId;
    processor.processBlock(block(2n, [record(defineNFT(NFT_TYPE)), record(mint)]));
    expect(storage.getToken(id)).toMatchObject({
      kind: "nft",
      nftName: "first",
      nftUri: "https://example.org/1",
      nftData: "0102",
      symbol: "ART",
      counter: 0n,
    });

    processor.processBlock(block(3n, [record(updateNFT(id, "ff", 0n))]));
    expect(storage.getToken(id)).toMatchObject({ nftData: "ff", counter: 1n });

    processor.processBlock(block(4n, [record(transNFT(id, NFT_TYPE, 1n))]));
    expect(storage.getToken(id)).toMatchObject({ owner: OTHER_OWNER, counter: 2n });
    expect(storage.getTokens("nft", OTHER_OWNER)).toHaveLength(1);
  });

  it("rejects minting an NFT of a fungible type", () => {
    const { processor } = funded();
    const b = block(2n, [record(defineFT(FT_TYPE)), record(mintNFT(FT_TYPE))]);
    expect(errorCode(() => processor.processBlock(b))).toBe("TYPE_NOT_FOUND");
  });
});

describe("BlockProcessor proofs", () => {
  it("stores a verifiable proof for every record", () => {
    const { storage, processor } = funded();
    const txs = [defineFT(FT_TYPE), mintFT(FT_TYPE, 10n, 0n), mintFT(FT_TYPE, 20n, 1n)];
    processor.processBlock(block(2n, txs.map((tx) => record(tx))));

    txs.forEach((tx, i) => {
      const proof = proofOf(storage, tx);
      expect(proof.txProof.leafIndex).toBe(i);
      expect(proof.txProof.round).toBe(2n);
      expect(verifyTxProof(proof)).toBe(true);
    });
  });
});
