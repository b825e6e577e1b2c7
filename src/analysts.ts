import type { AnalystKind } from "./types.js";
import type { CapabilityName } from "./tools.js";

/** Per-kind analyst setup: persona, prompt focus and data tools */
export interface AnalystDefinition {
  kind: AnalystKind;
  name: string;
  role: string;
  focus: string[];
  /** Label of the closing signal line, e.g. MARKET_SIGNAL */
  signal: string;
  tools(asset: string): CapabilityName[];
}

/** Chain-specific on-chain tool; everything else uses the generic one */
export const ONCHAIN_TOOL_BY_ASSET: Readonly<Record<string, CapabilityName>> = {
  BTC: "get_bitcoin_onchain_metrics",
  ETH: "get_ethereum_onchain_metrics",
};

export const GENERIC_ONCHAIN_TOOL: CapabilityName = "get_onchain_metrics";

export function onchainToolFor(asset: string): CapabilityName {
  return ONCHAIN_TOOL_BY_ASSET[asset.toUpperCase()] ?? GENERIC_ONCHAIN_TOOL;
}

export const ANALYST_DEFINITIONS: Readonly<Record<AnalystKind, AnalystDefinition>> = {
  market: {
    kind: "market",
    name: "Market Analyst",
    role: "a crypto market analyst covering price action, momentum and market structure",
    focus: [
      "Price trend over the recent window, with support and resistance levels",
      "Volume and volatility compared with the prior period",
      "Position within the broader market (total market cap, BTC dominance)",
      "Fear & Greed reading and what it implies for positioning",
      "Crypto trades 24/7 with far higher volatility than equities; size conclusions accordingly",
    ],
    signal: "MARKET_SIGNAL",
    tools: () => ["get_crypto_price_data", "get_global_crypto_market", "get_crypto_fear_greed_index"],
  },
  onchain: {
    kind: "onchain",
    name: "On-Chain Analyst",
    role: "an on-chain analyst reading network health and activity",
    focus: [
      "Network security and health (hash rate, difficulty, validator participation)",
      "Transaction activity and fee pressure (mempool congestion, gas prices)",
      "Supply dynamics and signs of accumulation or distribution",
      "Whether on-chain data confirms or contradicts price action",
      "Risks such as congestion, security concerns or centralization",
    ],
    signal: "ONCHAIN_SIGNAL",
    tools: (asset) => [onchainToolFor(asset), "get_crypto_price_data", "get_global_crypto_market"],
  },
  news: {
    kind: "news",
    name: "News Analyst",
    role: "a crypto news analyst tracking market-moving events and narratives",
    focus: [
      "Headlines about the asset from the recent window and their likely price impact",
      "Regulatory and legal developments (SEC, CFTC, ETFs, court rulings)",
      "Exchange, protocol or security incidents",
      "Institutional adoption or outflow signals",
      "Upcoming catalysts such as upgrades, unlocks or listings",
    ],
    signal: "NEWS_SIGNAL",
    tools: () => ["get_crypto_news", "get_regulatory_news"],
  },
  social: {
    kind: "social",
    name: "Social Sentiment Analyst",
    role: "a crypto social sentiment analyst tracking community mood and narratives",
    focus: [
      "Whether the asset is trending, and which competing coins or themes are",
      "Tone of recent coverage and community votes (bullish, bearish, apathetic)",
      "Narrative strength: is the story around the asset strengthening or fading",
      "Signs of euphoria or capitulation that mark local tops or bottoms",
    ],
    signal: "SENTIMENT_SIGNAL",
    tools: () => ["get_trending_cryptocurrencies", "get_crypto_news"],
  },
};
