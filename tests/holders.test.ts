import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { erc20Abi, type Chain } from "viem";
import { privateKeyToAccount, generatePrivateKey } from "viem/accounts";
import { Ledger, LedgerAssetHolder } from "../src/holders/ledger";
import { NativeAssetHolder, Erc20AssetHolder, type ChainHolderConfig } from "../src/holders/chain";
import { EscrowError } from "../src/errors";

const A = "0x0000000000000000000000000000000000000001";
const B = "0x0000000000000000000000000000000000000002";
const TX_HASH = `0x${"12".repeat(32)}` as const;

describe("Ledger", () => {
  it("should start every account at zero", () => {
    expect(new Ledger().balanceOf(A)).toBe(0n);
  });

  it("should accumulate deposits", () => {
    const ledger = new Ledger();
    ledger.deposit(A, 100n);
    ledger.deposit(A, 50n);
    expect(ledger.balanceOf(A)).toBe(150n);
  });

  it("should reject non-positive deposits", () => {
    expect(() => new Ledger().deposit(A, 0n)).toThrow(EscrowError);
  });

  it("should move value between accounts", () => {
    const ledger = new Ledger();
    ledger.deposit(A, 100n);
    expect(ledger.transfer(A, B, 40n)).toBe(true);
    expect(ledger.balanceOf(A)).toBe(60n);
    expect(ledger.balanceOf(B)).toBe(40n);
  });

  it("should fail without side effects when the sender is short", () => {
    const ledger = new Ledger();
    ledger.deposit(A, 10n);
    expect(ledger.transfer(A, B, 11n)).toBe(false);
    expect(ledger.balanceOf(A)).toBe(10n);
    expect(ledger.balanceOf(B)).toBe(0n);
  });

  it("should refuse transfers to rejecting recipients until switched off", () => {
    const ledger = new Ledger();
    ledger.deposit(A, 10n);
    ledger.setRejecting(B, true);
    expect(ledger.isRejecting(B)).toBe(true);
    expect(ledger.transfer(A, B, 5n)).toBe(false);
    ledger.setRejecting(B, false);
    expect(ledger.transfer(A, B, 5n)).toBe(true);
  });

  it("should treat differently cased addresses as one account", () => {
    const ledger = new Ledger();
    const mixed = "0x52908400098527886E0F7030069857D2E4169EE7";
    ledger.deposit(mixed, 7n);
    expect(ledger.balanceOf("0x52908400098527886e0f7030069857d2e4169ee7")).toBe(7n);
  });

  it("should survive a snapshot round trip", () => {
    const ledger = new Ledger();
    ledger.deposit(A, 123n);
    ledger.setRejecting(B, true);
    const snapshot = ledger.snapshot();
    expect(snapshot).toEqual({
      balances: { [A]: "123" },
      rejecting: [B],
    });
    const restored = Ledger.restore(snapshot);
    expect(restored.balanceOf(A)).toBe(123n);
    expect(restored.isRejecting(B)).toBe(true);
  });

  it("should back a LedgerAssetHolder", async () => {
    const ledger = new Ledger();
    const holder = new LedgerAssetHolder(ledger, A);
    ledger.deposit(A, 30n);
    expect(await holder.balance()).toBe(30n);
    expect(await holder.send(B, 20n)).toBe(true);
    expect(await holder.send(B, 20n)).toBe(false);
    expect(ledger.balanceOf(B)).toBe(20n);
  });
});

describe("chain asset holders", () => {
  const account = privateKeyToAccount(generatePrivateKey());
  const chain: Chain = {
    id: 31337,
    name: "Local",
    nativeCurrency: { name: "Ether", symbol: "ETH", decimals: 18 },
    rpcUrls: { default: { http: ["http://127.0.0.1:8545"] } },
  };

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function fakeClients(status: "success" | "reverted" = "success") {
    const pub = {
      getBalance: vi.fn().mockResolvedValue(500n),
      readContract: vi.fn().mockResolvedValue(900n),
      waitForTransactionReceipt: vi.fn().mockResolvedValue({ status }),
    };
    const wallet = {
      sendTransaction: vi.fn().mockResolvedValue(TX_HASH),
      writeContract: vi.fn().mockResolvedValue(TX_HASH),
    };
    // Only the methods the holders call are provided
    const config = { pub, wallet, account, chain } as unknown as ChainHolderConfig;
    return { pub, wallet, config };
  }

  it("should read and send native value", async () => {
    const { pub, wallet, config } = fakeClients();
    const holder = new NativeAssetHolder(config);
    expect(holder.address).toBe(account.address);
    expect(await holder.balance()).toBe(500n);
    expect(pub.getBalance).toHaveBeenCalledWith({ address: account.address });

    expect(await holder.send(B, 10n)).toBe(true);
    expect(wallet.sendTransaction).toHaveBeenCalledWith({ account, chain, to: B, value: 10n });
    expect(pub.waitForTransactionReceipt).toHaveBeenCalledWith({ hash: TX_HASH, timeout: 60_000 });
  });

  it("should read and send ERC-20 balances", async () => {
    const token = "0x0000000000000000000000000000000000000003";
    const { pub, wallet, config } = fakeClients();
    const holder = new Erc20AssetHolder(config, token);
    expect(await holder.balance()).toBe(900n);
    expect(pub.readContract).toHaveBeenCalledWith({
      address: token,
      abi: erc20Abi,
      functionName: "balanceOf",
      args: [account.address],
    });

    expect(await holder.send(B, 25n)).toBe(true);
    expect(wallet.writeContract).toHaveBeenCalledWith({
      address: token,
      abi: erc20Abi,
      functionName: "transfer",
      args: [B, 25n],
      account,
      chain,
    });
  });

  it("should report a reverted transfer as failed", async () => {
    const { config } = fakeClients("reverted");
    expect(await new NativeAssetHolder(config).send(B, 10n)).toBe(false);
  });

  it("should report an RPC failure as failed", async () => {
    const { wallet, config } = fakeClients();
    wallet.sendTransaction.mockRejectedValue(new Error("connection refused"));
    expect(await new NativeAssetHolder(config).send(B, 10n)).toBe(false);
    expect(console.error).toHaveBeenCalledWith(`Transfer of 10 to ${B} failed: connection refused`);
  });
});
