/**
 * Test helpers for @tokenwallet/wallet.
 *
 * FakePartition executes every order in its own block as soon as it is
 * sent, on top of the real BlockProcessor and an in-memory store.
 */

import { BlockProcessor, InMemoryStorage, getTypeHierarchy } from "@tokenwallet/block-processor";
import { ALWAYS_TRUE_BYTES, StaticAccountKeyProvider } from "@tokenwallet/predicates";
import type {
  AccountKey,
  FeeCreditBill,
  FungibleTokenUnit,
  Hex,
  RpcClient,
  TokenKindFilter,
  TokenTypeUnit,
  TokenUnit,
  TransactionOrder,
  TxRecordProof,
  TxType,
} from "@tokenwallet/types";
import { feeCreditRecordIdFor, toHex, transactionHash } from "@tokenwallet/types";
import { RpcFeeManager } from "../src/fee-manager.js";
import { TokenWallet, ownerPredicateOf } from "../src/token-wallet.js";
import type { TokenWalletConfig } from "../src/types.js";

export const NETWORK_ID = 3;
export const PARTITION_ID = 2;
export const MAX_FEE = 10n;
/** Actual fee charged for every transaction. */
export const FEE = 1n;

export const ALWAYS_TRUE: Hex = toHex(ALWAYS_TRUE_BYTES);
export const FT_TYPE: Hex = "01".repeat(32) + "20";
export const FT_SUBTYPE: Hex = "02".repeat(32) + "20";
export const NFT_TYPE: Hex = "03".repeat(32) + "22";

export class FakePartition implements RpcClient {
  readonly storage = new InMemoryStorage();
  private readonly processor = new BlockProcessor(this.storage);
  readonly sent: TransactionOrder[] = [];
  /** Orders of these types are recorded as failed instead of applied. */
  readonly failing = new Set<TxType>();

  async getRoundNumber(): Promise<bigint> {
    return this.storage.getBlockNumber();
  }

  async sendTransaction(tx: TransactionOrder): Promise<Hex> {
    this.sent.push(tx);
    this.execute(tx, this.failing.has(tx.payload.type));
    return transactionHash(tx);
  }

  async getTransactionProof(txHash: Hex): Promise<TxRecordProof | null> {
    return this.storage.getTxProof(txHash) ?? null;
  }

  async getToken(id: Hex): Promise<TokenUnit | null> {
    return this.storage.getToken(id) ?? null;
  }

  async getTokens(kind: TokenKindFilter, ownerPredicate: Hex): Promise<readonly TokenUnit[]> {
    return this.storage.getTokens(kind, ownerPredicate);
  }

  async getTokenTypes(kind: TokenKindFilter, creator?: Hex): Promise<readonly TokenTypeUnit[]> {
    return this.storage.getTokenTypes(kind, creator);
  }

  async getTypeHierarchy(id: Hex): Promise<readonly TokenTypeUnit[]> {
    if (this.storage.getTokenType(id) === undefined) return [];
    return getTypeHierarchy(this.storage, id);
  }

  async getFeeCreditRecord(id: Hex): Promise<FeeCreditBill | null> {
    return this.storage.getFeeCreditBill(id) ?? null;
  }

  /** Credit `amount` to the fee credit record of `key`. */
  fund(key: AccountKey, amount: bigint): void {
    const owner = ownerPredicateOf(key);
    this.execute(
      {
        payload: {
          networkId: NETWORK_ID,
          partitionId: PARTITION_ID,
          unitId: feeCreditRecordIdFor(owner),
          type: "addFC",
          attributes: {
            feeCreditOwnerPredicate: owner,
            transferAmount: amount,
            transferFee: 0n,
            transferTxHash: "ab".repeat(32),
          },
          clientMetadata: { timeout: 1000n, maxTransactionFee: MAX_FEE, feeCreditRecordId: null },
        },
        stateUnlock: null,
        authProof: {},
        feeProof: null,
      },
      false,
    );
  }

  fungibleTokens(key: AccountKey): FungibleTokenUnit[] {
    return this.storage
      .getTokens("fungible", ownerPredicateOf(key))
      .filter((t): t is FungibleTokenUnit => t.kind === "fungible");
  }

  feeBalance(key: AccountKey): bigint | undefined {
    return this.storage.getFeeCreditBill(feeCreditRecordIdFor(ownerPredicateOf(key)))?.balance;
  }

  private execute(tx: TransactionOrder, failed: boolean): void {
    this.processor.processBlock({
      header: {
        partitionId: PARTITION_ID,
        round: this.storage.getBlockNumber() + 1n,
        previousBlockHash: null,
      },
      transactions: [
        {
          transactionOrder: tx,
          serverMetadata: { actualFee: FEE, successIndicator: failed ? "failed" : "successful" },
        },
      ],
    });
  }
}

export interface WalletFixture {
  readonly partition: FakePartition;
  readonly wallet: TokenWallet;
  readonly alice: AccountKey;
  readonly bob: AccountKey;
}

/** Wallet over two accounts; only the first one has fee credit. */
export async function setup(config: Partial<TokenWalletConfig> = {}): Promise<WalletFixture> {
  const partition = new FakePartition();
  const keys = new StaticAccountKeyProvider([new Uint8Array(32).fill(1), new Uint8Array(32).fill(2)]);
  const wallet = new TokenWallet(
    { networkId: NETWORK_ID, partitionId: PARTITION_ID, maxFee: MAX_FEE, ...config },
    {
      rpc: partition,
      keys,
      feeManager: new RpcFeeManager(partition, keys, MAX_FEE),
      sleepFn: async () => {},
    },
  );
  const alice = await keys.getAccountKey(1);
  const bob = await keys.getAccountKey(2);
  partition.fund(alice, 1000n);
  return { partition, wallet, alice, bob };
}

/** Define {@link FT_TYPE} with two decimal places. */
export async function defineFungible(wallet: TokenWallet, id: Hex = FT_TYPE): Promise<void> {
  await wallet.newFungibleType(1, {
    id,
    symbol: "TT",
    name: "Test Token",
    decimalPlaces: 2,
    subTypeCreationPredicate: ALWAYS_TRUE,
    tokenMintingPredicate: ALWAYS_TRUE,
    tokenTypeOwnerPredicate: ALWAYS_TRUE,
  });
}

/** Mint a fungible token to account 1 and return its ID. */
export async function mint(wallet: TokenWallet, value: bigint, nonce: bigint): Promise<Hex> {
  const result = await wallet.newFungibleToken(1, { typeId: FT_TYPE, value, nonce });
  const submission = result.submissions[0];
  if (submission === undefined) throw new Error("mint not submitted");
  return submission.unitId;
}
