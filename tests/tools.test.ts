import { describe, it, expect } from "vitest";
import { z } from "zod";
import { CAPABILITY_NAMES, ToolInvoker, defineCapability, describeCapability, isCapabilityName, validateRegistry } from "../src/tools.js";
import { defaultCapabilities } from "../src/capabilities.js";
import { ConfigurationError, ToolFailure } from "../src/errors.js";
import { fakeCapabilities } from "./helpers.js";

const priceCapability = defineCapability({
  name: "get_crypto_price_data",
  description: "Price data.",
  args: {
    symbol: z.string().min(1).describe("Crypto symbol"),
    days: z.number().int().default(30).describe("Days of history"),
  },
  handler: async ({ symbol, days }) => `${symbol} over ${days} days`,
});

function invokerWith(...extra: ReturnType<typeof defineCapability>[]) {
  return new ToolInvoker([priceCapability, ...extra], { timeoutMs: 50 });
}

describe("capability registry", () => {
  it("registers every known capability exactly once by default", () => {
    const caps = defaultCapabilities();
    expect(caps.map((c) => c.name).sort()).toEqual([...CAPABILITY_NAMES].sort());
    expect(() => validateRegistry(caps)).not.toThrow();
  });

  it("knows its names", () => {
    expect(isCapabilityName("get_regulatory_news")).toBe(true);
    expect(isCapabilityName("get_stock_quote")).toBe(false);
  });

  it("reports duplicates, blank descriptions and missing names together", () => {
    const blank = defineCapability({
      name: "get_crypto_news",
      description: " ",
      args: {},
      handler: async () => "",
    });
    try {
      validateRegistry([priceCapability, priceCapability, blank], ["get_crypto_price_data", "get_crypto_news", "get_regulatory_news"]);
      expect.unreachable();
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (!(err instanceof ConfigurationError)) return;
      expect(err.issues).toEqual([
        "get_crypto_price_data: registered more than once",
        "get_crypto_news: missing description",
        "get_regulatory_news: not registered",
      ]);
    }
  });
});

describe("ToolInvoker", () => {
  it("validates arguments and applies defaults", async () => {
    const result = await invokerWith().invoke("get_crypto_price_data", { symbol: "BTC" });
    expect(result).toEqual({ ok: true, capability: "get_crypto_price_data", text: "BTC over 30 days" });
  });

  it("returns a permanent failure for invalid arguments", async () => {
    const result = await invokerWith().invoke("get_crypto_price_data", { days: 7 });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure).toBe("permanent");
    expect(result.message.startsWith("invalid arguments for get_crypto_price_data: symbol: ")).toBe(true);
  });

  it("answers an unknown capability without throwing", async () => {
    expect(await invokerWith().invoke("get_weather", {})).toEqual({
      ok: false,
      capability: "get_weather",
      failure: "unknown_capability",
      message: "Unknown capability: get_weather",
    });
  });

  it("keeps the kind of a ToolFailure and treats other errors as transient", async () => {
    const permanent = defineCapability({
      name: "get_onchain_metrics",
      description: "On-chain.",
      args: {},
      handler: async () => {
        throw new ToolFailure("permanent", "CryptoCompare is not configured: set CRYPTOCOMPARE_API_KEY to enable it");
      },
    });
    const flaky = defineCapability({
      name: "get_crypto_news",
      description: "News.",
      args: {},
      handler: async () => {
        throw new TypeError("fetch failed");
      },
    });
    const invoker = invokerWith(permanent, flaky);

    expect(await invoker.invoke("get_onchain_metrics", {})).toMatchObject({ ok: false, failure: "permanent" });
    expect(await invoker.invoke("get_crypto_news", {})).toEqual({
      ok: false,
      capability: "get_crypto_news",
      failure: "transient",
      message: "fetch failed",
    });
  });

  it("times out slow capabilities as transient failures", async () => {
    const slow = defineCapability({
      name: "get_global_crypto_market",
      description: "Global.",
      args: {},
      handler: (_args, { signal }) =>
        new Promise<string>((resolve) => {
          const timer = setTimeout(() => resolve("late"), 1_000);
          signal.addEventListener("abort", () => clearTimeout(timer));
        }),
    });
    const result = await invokerWith(slow).invoke("get_global_crypto_market", {});
    expect(result).toEqual({
      ok: false,
      capability: "get_global_crypto_market",
      failure: "transient",
      message: "tool get_global_crypto_market timed out after 50ms",
    });
  });

  it("describes tools for prompts in the requested order", () => {
    const invoker = new ToolInvoker(fakeCapabilities(), { timeoutMs: 50 });
    expect(invoker.describeTools(["get_regulatory_news", "no_such_tool", "get_crypto_news"])).toBe(
      [
        "- get_regulatory_news: get_regulatory_news (fake)",
        "    args: symbol (string, optional)",
        "- get_crypto_news: get_crypto_news (fake)",
        "    args: symbol (string, optional)",
      ].join("\n"),
    );
  });
});

describe("describeCapability", () => {
  it("lists argument types, optionality and descriptions", () => {
    expect(describeCapability(priceCapability)).toBe(
      "- get_crypto_price_data: Price data.\n" +
        "    args: symbol (string) - Crypto symbol; days (number, optional) - Days of history",
    );
  });

  it("says when there are no arguments", () => {
    const globalCap = defaultCapabilities().find((c) => c.name === "get_global_crypto_market");
    expect(globalCap && describeCapability(globalCap)).toBe(
      "- get_global_crypto_market: Total crypto market cap, 24h change, volume and BTC/ETH dominance.\n    args: none",
    );
  });
});
