import { z } from "zod";
import { ToolFailure } from "../errors.js";
import { formatCompact, formatPct, formatUsd, getJson } from "./http.js";

const COINGECKO_BASE_URL = "https://api.coingecko.com/api/v3";
const FEAR_GREED_URL = "https://api.alternative.me/fng/";

/** CoinGecko ids for the common tokens; anything else goes through /search */
export const COINGECKO_IDS: Readonly<Record<string, string>> = {
  BTC: "bitcoin",
  ETH: "ethereum",
  SOL: "solana",
  MATIC: "matic-network",
  AVAX: "avalanche-2",
  BNB: "binancecoin",
  ADA: "cardano",
  DOT: "polkadot",
  LINK: "chainlink",
  UNI: "uniswap",
  ATOM: "cosmos",
  XRP: "ripple",
  DOGE: "dogecoin",
  SHIB: "shiba-inu",
  LTC: "litecoin",
  BCH: "bitcoin-cash",
  NEAR: "near",
  APT: "aptos",
  ARB: "arbitrum",
  OP: "optimism",
};

// OHLC candles are only served for these windows
const OHLC_WINDOWS = [1, 7, 14, 30, 90, 180, 365];

function headers(): Record<string, string> {
  const key = process.env.COINGECKO_API_KEY;
  return key ? { "x-cg-demo-api-key": key } : {};
}

async function coingecko(path: string, params: Record<string, string | number>, signal?: AbortSignal): Promise<unknown> {
  return getJson("CoinGecko", `${COINGECKO_BASE_URL}${path}`, { params, headers: headers(), signal });
}

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, what: string): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new ToolFailure("permanent", `unexpected ${what} response shape`);
  }
  return parsed.data;
}

// ── Coin lookup ──────────────────────────────────────────────

const searchSchema = z.object({
  coins: z.array(z.object({ id: z.string(), symbol: z.string() })),
});

export async function resolveCoinId(symbol: string, signal?: AbortSignal): Promise<string> {
  const upper = symbol.toUpperCase();
  const known = COINGECKO_IDS[upper];
  if (known) return known;

  const data = parse(searchSchema, await coingecko("/search", { query: upper }, signal), "CoinGecko search");
  const match = data.coins.find((c) => c.symbol.toUpperCase() === upper);
  if (!match) {
    throw new ToolFailure("permanent", `Unknown crypto symbol: ${upper}`);
  }
  return match.id;
}

// ── Price and market data ────────────────────────────────────

const num = z.number().nullable().optional();

const marketSchema = z.array(
  z.object({
    name: z.string(),
    symbol: z.string(),
    current_price: num,
    market_cap: num,
    market_cap_rank: num,
    total_volume: num,
    high_24h: num,
    low_24h: num,
    price_change_percentage_24h_in_currency: num,
    price_change_percentage_7d_in_currency: num,
    price_change_percentage_30d_in_currency: num,
    circulating_supply: num,
    max_supply: num,
    ath: num,
    ath_date: z.string().nullable().optional(),
  }),
);

const ohlcSchema = z.array(z.tuple([z.number(), z.number(), z.number(), z.number(), z.number()]));

function line(label: string, value: number | null | undefined, render: (n: number) => string): string[] {
  return value === null || value === undefined ? [] : [`  ${label}: ${render(value)}`];
}

const VOLUME_24H_LABEL = "24h Volume (USD)";
const VOLUME_24H_PATTERN = /^\s*24h Volume \(USD\):\s*(\d+(?:\.\d+)?)\s*$/m;

/** The 24h volume line of a price data summary, when present */
export function parseVolume24h(text: string): number | undefined {
  const match = text.match(VOLUME_24H_PATTERN);
  return match ? Number(match[1]) : undefined;
}

export async function getPriceData(symbol: string, days: number, signal?: AbortSignal): Promise<string> {
  const id = await resolveCoinId(symbol, signal);
  const markets = parse(
    marketSchema,
    await coingecko(
      "/coins/markets",
      { vs_currency: "usd", ids: id, price_change_percentage: "24h,7d,30d" },
      signal,
    ),
    "CoinGecko markets",
  );
  const market = markets[0];
  if (!market) {
    throw new ToolFailure("permanent", `No market data for ${symbol.toUpperCase()}`);
  }

  const window = OHLC_WINDOWS.find((w) => w >= days) ?? 365;
  const candles = parse(
    ohlcSchema,
    await coingecko(`/coins/${id}/ohlc`, { vs_currency: "usd", days: window }, signal),
    "CoinGecko OHLC",
  );

  const lines = [
    `=== ${market.name} (${market.symbol.toUpperCase()}) Market Data ===`,
    ...line("Price", market.current_price, (n) => formatUsd(n)),
    ...line("Market Cap", market.market_cap, (n) => `$${formatCompact(n)}`),
    ...line("Market Cap Rank", market.market_cap_rank, (n) => `#${n}`),
    ...line(VOLUME_24H_LABEL, market.total_volume, (n) => Math.round(n).toString()),
    ...line("24h High", market.high_24h, (n) => formatUsd(n)),
    ...line("24h Low", market.low_24h, (n) => formatUsd(n)),
    ...line("24h Change", market.price_change_percentage_24h_in_currency, formatPct),
    ...line("7d Change", market.price_change_percentage_7d_in_currency, formatPct),
    ...line("30d Change", market.price_change_percentage_30d_in_currency, formatPct),
    ...line("Circulating Supply", market.circulating_supply, formatCompact),
    ...line("Max Supply", market.max_supply, formatCompact),
    ...line("All-Time High", market.ath, (n) => formatUsd(n)),
  ];

  if (candles.length > 0) {
    const first = candles[0];
    const last = candles[candles.length - 1];
    const high = Math.max(...candles.map((c) => c[2]));
    const low = Math.min(...candles.map((c) => c[3]));
    const change = first[1] === 0 ? 0 : ((last[4] - first[1]) / first[1]) * 100;
    lines.push(
      "",
      `Price History (${window} days, ${candles.length} candles):`,
      `  Open: ${formatUsd(first[1])}`,
      `  Close: ${formatUsd(last[4])}`,
      `  Change: ${formatPct(change)}`,
      `  High: ${formatUsd(high)}`,
      `  Low: ${formatUsd(low)}`,
    );
  }
  return lines.join("\n");
}

// ── Global market ────────────────────────────────────────────

const globalSchema = z.object({
  data: z.object({
    active_cryptocurrencies: z.number(),
    total_market_cap: z.record(z.number()),
    total_volume: z.record(z.number()),
    market_cap_percentage: z.record(z.number()),
    market_cap_change_percentage_24h_usd: z.number(),
  }),
});

export async function getGlobalMarket(signal?: AbortSignal): Promise<string> {
  const { data } = parse(globalSchema, await coingecko("/global", {}, signal), "CoinGecko global");
  return [
    "=== Global Crypto Market ===",
    `  Total Market Cap: $${formatCompact(data.total_market_cap.usd ?? 0)}`,
    `  24h Market Cap Change: ${formatPct(data.market_cap_change_percentage_24h_usd)}`,
    `  24h Volume: $${formatCompact(data.total_volume.usd ?? 0)}`,
    `  BTC Dominance: ${(data.market_cap_percentage.btc ?? 0).toFixed(2)}%`,
    `  ETH Dominance: ${(data.market_cap_percentage.eth ?? 0).toFixed(2)}%`,
    `  Active Cryptocurrencies: ${data.active_cryptocurrencies}`,
  ].join("\n");
}

// ── Trending ─────────────────────────────────────────────────

const trendingSchema = z.object({
  coins: z.array(
    z.object({
      item: z.object({
        name: z.string(),
        symbol: z.string(),
        market_cap_rank: z.number().nullable().optional(),
        price_btc: z.number().optional(),
      }),
    }),
  ),
});

export async function getTrending(limit: number, signal?: AbortSignal): Promise<string> {
  const data = parse(trendingSchema, await coingecko("/search/trending", {}, signal), "CoinGecko trending");
  const coins = data.coins.slice(0, limit);
  if (coins.length === 0) return "No trending coins reported.";

  const lines = [`=== Top ${coins.length} Trending Cryptocurrencies ===`];
  coins.forEach(({ item }, i) => {
    const rank = item.market_cap_rank ? `#${item.market_cap_rank}` : "unranked";
    const price = item.price_btc !== undefined ? `, ${item.price_btc.toFixed(8)} BTC` : "";
    lines.push(`${i + 1}. ${item.name} (${item.symbol.toUpperCase()}), rank ${rank}${price}`);
  });
  return lines.join("\n");
}

// ── Fear & Greed (alternative.me) ────────────────────────────

const fearGreedSchema = z.object({
  data: z.array(
    z.object({
      value: z.coerce.number(),
      value_classification: z.string(),
      timestamp: z.coerce.number(),
    }),
  ),
});

export async function getFearGreed(days: number, signal?: AbortSignal): Promise<string> {
  const data = parse(
    fearGreedSchema,
    await getJson("alternative.me", FEAR_GREED_URL, { params: { limit: days }, signal }),
    "Fear & Greed",
  );
  const [current, ...history] = data.data;
  if (!current) {
    throw new ToolFailure("transient", "Fear & Greed index returned no readings");
  }
  const lines = [
    "=== Crypto Fear & Greed Index ===",
    `  Current: ${current.value}/100 (${current.value_classification})`,
  ];
  if (history.length > 0) {
    lines.push(`  Previous ${history.length} readings:`);
    for (const reading of history) {
      const day = new Date(reading.timestamp * 1000).toISOString().slice(0, 10);
      lines.push(`    ${day}: ${reading.value} (${reading.value_classification})`);
    }
  }
  return lines.join("\n");
}
