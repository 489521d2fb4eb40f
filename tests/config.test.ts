import { describe, it, expect } from "vitest";
import { homedir } from "os";
import { join } from "path";
import { DEFAULT_FACTORY, describeConfig, loadConfig, parseUnixSeconds } from "../src/config";
import { EscrowError } from "../src/errors";

describe("config", () => {
  describe("loadConfig", () => {
    it("should fall back to defaults", () => {
      expect(loadConfig({})).toEqual({
        home: join(homedir(), ".config", "xswap"),
        stateSecret: "",
        key: null,
        factory: DEFAULT_FACTORY,
        now: null,
        format: null,
      });
    });

    it("should read every XSWAP_ variable", () => {
      const config = loadConfig({
        XSWAP_HOME: "/tmp/xswap-home",
        XSWAP_STATE_SECRET: "test-secret",
        XSWAP_KEY: " 0xabc ",
        XSWAP_FACTORY: "0x0000000000000000000000000000000000000099",
        XSWAP_NOW: "1700000000",
        XSWAP_FORMAT: "json",
      });
      expect(config).toEqual({
        home: "/tmp/xswap-home",
        stateSecret: "test-secret",
        key: "0xabc",
        factory: "0x0000000000000000000000000000000000000099",
        now: 1_700_000_000n,
        format: "json",
      });
    });

    it("should ignore unknown formats and blank values", () => {
      const config = loadConfig({ XSWAP_FORMAT: "yaml", XSWAP_KEY: "  ", XSWAP_NOW: "" });
      expect(config.format).toBeNull();
      expect(config.key).toBeNull();
      expect(config.now).toBeNull();
    });

    it("should reject an invalid factory address", () => {
      expect(() => loadConfig({ XSWAP_FACTORY: "0x42" })).toThrow("XSWAP_FACTORY is not a valid address: 0x42");
    });

    it("should reject a non-numeric clock override", () => {
      expect(() => loadConfig({ XSWAP_NOW: "tomorrow" })).toThrow('XSWAP_NOW must be unix seconds, got "tomorrow"');
    });
  });

  describe("parseUnixSeconds", () => {
    it("should parse whole seconds", () => {
      expect(parseUnixSeconds(" 42 ", "--now")).toBe(42n);
    });

    it("should reject negatives and fractions", () => {
      expect(() => parseUnixSeconds("-1", "--now")).toThrow(EscrowError);
      expect(() => parseUnixSeconds("1.5", "--now")).toThrow(EscrowError);
    });
  });

  describe("describeConfig", () => {
    it("should mask secrets", () => {
      const shown = describeConfig(
        loadConfig({ XSWAP_HOME: "/h", XSWAP_STATE_SECRET: "test-secret", XSWAP_KEY: "0xabc", XSWAP_NOW: "5" })
      );
      expect(shown).toEqual({
        home: "/h",
        stateSecret: "(set)",
        key: "(set)",
        factory: DEFAULT_FACTORY,
        now: "5",
        format: "(auto)",
      });
    });

    it("should say when nothing is set", () => {
      const shown = describeConfig(loadConfig({ XSWAP_HOME: "/h" }));
      expect(shown.stateSecret).toBe("(empty)");
      expect(shown.key).toBe("(not set)");
      expect(shown.now).toBe("(wall clock)");
    });
  });
});
