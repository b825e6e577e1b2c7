import { z } from "zod";
import { defineCapability, ToolInvoker, type Capability } from "./tools.js";
import type { Logger } from "./logger.js";
import { getFearGreed, getGlobalMarket, getPriceData, getTrending } from "./sources/coingecko.js";
import { getBitcoinMetrics, getEthereumMetrics, getGenericMetrics } from "./sources/onchain.js";
import { getCryptoNews, getRegulatoryNews } from "./sources/news.js";
import { getChainTvl } from "./sources/defillama.js";
import { getFullAnalysis } from "./sources/full-analysis.js";

const symbolArg = z.string().min(1).describe("Crypto symbol (e.g. BTC, ETH, SOL)");

/** The live data capabilities, backed by public crypto APIs */
export function defaultCapabilities(): Capability[] {
  return [
    defineCapability({
      name: "get_crypto_price_data",
      description:
        "Current price, market cap, volume, 24h/7d/30d changes and an OHLC price history summary for a coin.",
      args: {
        symbol: symbolArg,
        days: z.number().int().min(1).max(365).default(30).describe("Days of price history"),
      },
      handler: ({ symbol, days }, { signal }) => getPriceData(symbol, days, signal),
    }),
    defineCapability({
      name: "get_global_crypto_market",
      description: "Total crypto market cap, 24h change, volume and BTC/ETH dominance.",
      args: {},
      handler: (_args, { signal }) => getGlobalMarket(signal),
    }),
    defineCapability({
      name: "get_crypto_fear_greed_index",
      description: "Crypto Fear & Greed Index (0-100) with recent daily readings.",
      args: {
        days: z.number().int().min(1).max(30).default(7).describe("Number of daily readings"),
      },
      handler: ({ days }, { signal }) => getFearGreed(days, signal),
    }),
    defineCapability({
      name: "get_trending_cryptocurrencies",
      description: "Coins trending by search interest on CoinGecko.",
      args: {
        limit: z.number().int().min(1).max(15).default(10).describe("Number of coins"),
      },
      handler: ({ limit }, { signal }) => getTrending(limit, signal),
    }),
    defineCapability({
      name: "get_bitcoin_onchain_metrics",
      description: "Bitcoin hash rate, difficulty, block time, transactions, miner revenue and mempool congestion.",
      args: {},
      handler: (_args, { signal }) => getBitcoinMetrics(signal),
    }),
    defineCapability({
      name: "get_ethereum_onchain_metrics",
      description: "Ethereum gas prices, base fee, congestion and total supply. Needs ETHERSCAN_API_KEY.",
      args: {},
      handler: (_args, { signal }) => getEthereumMetrics(signal),
    }),
    defineCapability({
      name: "get_onchain_metrics",
      description: "Active addresses, transactions and network stats for any chain. Needs CRYPTOCOMPARE_API_KEY.",
      args: { symbol: symbolArg },
      handler: ({ symbol }, { signal }) => getGenericMetrics(symbol, signal),
    }),
    defineCapability({
      name: "get_defi_chain_metrics",
      description: "Total value locked on the coin's chain, its TVL rank and 7d/30d TVL change (DefiLlama).",
      args: { symbol: symbolArg },
      handler: ({ symbol }, { signal }) => getChainTvl(symbol, signal),
    }),
    defineCapability({
      name: "get_crypto_news",
      description: "Recent news headlines mentioning a coin, with community votes. Needs CRYPTOPANIC_API_KEY.",
      args: {
        symbol: symbolArg,
        hours: z.number().int().min(1).max(168).default(24).describe("Hours to look back"),
        limit: z.number().int().min(1).max(50).default(10).describe("Maximum articles"),
      },
      handler: ({ symbol, hours, limit }, { signal }) => getCryptoNews(symbol, hours, limit, signal),
    }),
    defineCapability({
      name: "get_regulatory_news",
      description: "Regulation, legal and policy headlines affecting crypto. Needs CRYPTOPANIC_API_KEY.",
      args: {
        hours: z.number().int().min(1).max(336).default(168).describe("Hours to look back"),
        limit: z.number().int().min(1).max(50).default(10).describe("Maximum articles"),
      },
      handler: ({ hours, limit }, { signal }) => getRegulatoryNews(hours, limit, signal),
    }),
    defineCapability({
      name: "get_crypto_full_analysis",
      description:
        "Price data, on-chain metrics, the last 48h of news and global market context for a coin in one call. " +
        "Sections that fail are noted and the rest still returned.",
      args: {
        symbol: symbolArg,
        days: z.number().int().min(1).max(365).default(30).describe("Days of price history"),
      },
      handler: ({ symbol, days }, { signal }) => getFullAnalysis(symbol, days, signal),
    }),
  ];
}

export function createDefaultInvoker(options: { timeoutMs: number; logger?: Logger }): ToolInvoker {
  return new ToolInvoker(defaultCapabilities(), options);
}
