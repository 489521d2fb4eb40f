import { describe, it, expect } from "vitest";
import { hashMessage, size } from "viem";
import { generatePrivateKey, privateKeyToAccount } from "viem/accounts";
import {
  cashoutMessage,
  refundMessage,
  puzzleMessage,
  messageDigest,
  cashoutDigest,
  refundDigest,
  puzzleDigest,
  type PuzzleTerms,
} from "../src/crypto/messages";
import { recoverSigner, isSignedBy, signCashout, signRefund, signPuzzle } from "../src/crypto/signature";
import { generatePreimage, hashPreimage, isBytes32, verifyPreimage } from "../src/crypto/puzzle";
import { EscrowError } from "../src/errors";

const HANDLE = "0x1111111111111111111111111111111111111111";
const OTHER_HANDLE = "0x2222222222222222222222222222222222222222";

const word = (value: number) => value.toString(16).padStart(64, "0");

const TERMS: PuzzleTerms = {
  prevAmountTraded: 300n,
  tradeAmount: 200n,
  puzzleHash: `0x${"ab".repeat(32)}`,
  puzzleTimelock: 5000n,
};

describe("crypto", () => {
  describe("message encoding", () => {
    it("should pack cashout as handle || 0x01 || amount", () => {
      expect(cashoutMessage(HANDLE, 400n)).toBe(`0x${"11".repeat(20)}01${word(400)}`);
    });

    it("should pack refund with type tag 0x03", () => {
      expect(refundMessage(HANDLE, 400n)).toBe(`0x${"11".repeat(20)}03${word(400)}`);
    });

    it("should pack puzzle fields in order with type tag 0x02", () => {
      expect(puzzleMessage(HANDLE, TERMS)).toBe(
        `0x${"11".repeat(20)}02${word(300)}${word(200)}${"ab".repeat(32)}${word(5000)}`
      );
    });

    it("should produce fixed-length messages", () => {
      expect(size(cashoutMessage(HANDLE, 0n))).toBe(53);
      expect(size(refundMessage(HANDLE, 2n ** 255n))).toBe(53);
      expect(size(puzzleMessage(HANDLE, TERMS))).toBe(149);
    });
  });

  describe("digests", () => {
    it("should use the EIP-191 personal message digest", () => {
      expect(cashoutDigest(HANDLE, 400n)).toBe(hashMessage({ raw: cashoutMessage(HANDLE, 400n) }));
      expect(refundDigest(HANDLE, 400n)).toBe(hashMessage({ raw: refundMessage(HANDLE, 400n) }));
      expect(puzzleDigest(HANDLE, TERMS)).toBe(hashMessage({ raw: puzzleMessage(HANDLE, TERMS) }));
    });

    it("should separate message families and handles", () => {
      expect(cashoutDigest(HANDLE, 400n)).not.toBe(refundDigest(HANDLE, 400n));
      expect(cashoutDigest(HANDLE, 400n)).not.toBe(cashoutDigest(OTHER_HANDLE, 400n));
    });

    it("should reject a message of unexpected length", () => {
      expect(() => messageDigest(cashoutMessage(HANDLE, 1n), 149)).toThrow(EscrowError);
    });
  });

  describe("signatures", () => {
    const account = privateKeyToAccount(generatePrivateKey());
    const stranger = privateKeyToAccount(generatePrivateKey());

    it("should recover the signer of a cashout", async () => {
      const sig = await signCashout(account, HANDLE, 400n);
      expect(await recoverSigner(cashoutDigest(HANDLE, 400n), sig)).toBe(account.address);
      expect(await isSignedBy(cashoutDigest(HANDLE, 400n), sig, account.address)).toBe(true);
      expect(await isSignedBy(cashoutDigest(HANDLE, 400n), sig, stranger.address)).toBe(false);
    });

    it("should not accept a signature for a different amount", async () => {
      const sig = await signCashout(account, HANDLE, 400n);
      expect(await isSignedBy(cashoutDigest(HANDLE, 401n), sig, account.address)).toBe(false);
    });

    it("should not let a cashout signature pass as a refund", async () => {
      const sig = await signCashout(account, HANDLE, 400n);
      expect(await isSignedBy(refundDigest(HANDLE, 400n), sig, account.address)).toBe(false);
    });

    it("should not replay across handles", async () => {
      const sig = await signRefund(account, HANDLE, 400n);
      expect(await isSignedBy(refundDigest(HANDLE, 400n), sig, account.address)).toBe(true);
      expect(await isSignedBy(refundDigest(OTHER_HANDLE, 400n), sig, account.address)).toBe(false);
    });

    it("should sign puzzle terms", async () => {
      const sig = await signPuzzle(account, HANDLE, TERMS);
      expect(await isSignedBy(puzzleDigest(HANDLE, TERMS), sig, account.address)).toBe(true);
      expect(await isSignedBy(puzzleDigest(HANDLE, { ...TERMS, tradeAmount: 201n }), sig, account.address)).toBe(false);
    });

    it("should return null for malformed signatures", async () => {
      const digest = cashoutDigest(HANDLE, 400n);
      expect(await recoverSigner(digest, "not-hex")).toBeNull();
      expect(await recoverSigner(digest, "0x1234")).toBeNull();
      expect(await recoverSigner(digest, `0x${"00".repeat(65)}`)).toBeNull();
      expect(await isSignedBy(digest, "", account.address)).toBe(false);
    });
  });

  describe("puzzle", () => {
    it("should hash with SHA-256", () => {
      // SHA-256 of 32 zero bytes
      expect(hashPreimage(`0x${"00".repeat(32)}`)).toBe(
        "0x66687aadf862bd776c8fc18b8e9f8e20089714856ee233b3902a591d0d5f2925"
      );
    });

    it("should generate 32-byte preimages that verify", () => {
      const preimage = generatePreimage();
      expect(isBytes32(preimage)).toBe(true);
      expect(verifyPreimage(preimage, hashPreimage(preimage))).toBe(true);
      expect(verifyPreimage(preimage, hashPreimage(generatePreimage()))).toBe(false);
    });

    it("should compare hashes case-insensitively", () => {
      const preimage = generatePreimage();
      const hash = hashPreimage(preimage);
      expect(verifyPreimage(preimage, `0x${hash.slice(2).toUpperCase()}`)).toBe(true);
    });

    it("should recognise bytes32 values", () => {
      expect(isBytes32(`0x${"ab".repeat(32)}`)).toBe(true);
      expect(isBytes32(`0x${"ab".repeat(31)}`)).toBe(false);
      expect(isBytes32("ab".repeat(32))).toBe(false);
      expect(isBytes32(`0x${"zz".repeat(32)}`)).toBe(false);
    });
  });
});
