import { z } from "zod";
import { ToolFailure } from "../errors.js";
import { formatCompact, formatUsd, getJson, getText, notConfigured } from "./http.js";

const BLOCKCHAIN_INFO_URL = "https://blockchain.info";
const ETHERSCAN_URL = "https://api.etherscan.io/api";
const CRYPTOCOMPARE_URL = "https://min-api.cryptocompare.com/data/blockchain/latest";

function congestion(value: number, low: number, high: number): "Low" | "Medium" | "High" {
  if (value > high) return "High";
  if (value < low) return "Low";
  return "Medium";
}

// ── Bitcoin (blockchain.info, no key) ────────────────────────

const btcStatsSchema = z.object({
  market_price_usd: z.number(),
  hash_rate: z.number(),
  difficulty: z.number(),
  n_tx: z.number(),
  minutes_between_blocks: z.number(),
  totalbc: z.number(),
  estimated_transaction_volume_usd: z.number(),
  miners_revenue_usd: z.number(),
});

export async function getBitcoinMetrics(signal?: AbortSignal): Promise<string> {
  const raw = await getJson("blockchain.info", `${BLOCKCHAIN_INFO_URL}/stats`, {
    params: { format: "json" },
    signal,
  });
  const parsed = btcStatsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ToolFailure("permanent", "unexpected blockchain.info stats response shape");
  }
  const stats = parsed.data;

  const unconfirmedText = await getText("blockchain.info", `${BLOCKCHAIN_INFO_URL}/q/unconfirmedcount`, { signal });
  const unconfirmed = Number.parseInt(unconfirmedText.trim(), 10);

  const lines = [
    "=== Bitcoin On-Chain Metrics ===",
    `  Market Price: ${formatUsd(stats.market_price_usd)}`,
    // hash_rate is reported in GH/s
    `  Hash Rate: ${formatCompact(stats.hash_rate / 1e9)} EH/s`,
    `  Difficulty: ${formatCompact(stats.difficulty)}`,
    `  Minutes Between Blocks: ${stats.minutes_between_blocks.toFixed(2)}`,
    `  Total BTC Mined: ${formatCompact(stats.totalbc / 1e8)}`,
    `  24h Transactions: ${stats.n_tx.toLocaleString("en-US")}`,
    `  24h Estimated Volume: $${formatCompact(stats.estimated_transaction_volume_usd)}`,
    `  24h Miner Revenue: $${formatCompact(stats.miners_revenue_usd)}`,
  ];
  if (Number.isFinite(unconfirmed)) {
    lines.push(
      `  Mempool: ${unconfirmed.toLocaleString("en-US")} unconfirmed transactions ` +
        `(congestion ${congestion(unconfirmed, 2_000, 10_000)})`,
    );
  }
  return lines.join("\n");
}

// ── Ethereum (Etherscan, key required) ───────────────────────

const etherscanSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  result: z.unknown(),
});

const gasOracleSchema = z.object({
  SafeGasPrice: z.coerce.number(),
  ProposeGasPrice: z.coerce.number(),
  FastGasPrice: z.coerce.number(),
  suggestBaseFee: z.coerce.number(),
});

async function etherscan(action: { module: string; action: string }, key: string, signal?: AbortSignal): Promise<unknown> {
  const raw = await getJson("Etherscan", ETHERSCAN_URL, { params: { ...action, apikey: key }, signal });
  const parsed = etherscanSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ToolFailure("permanent", "unexpected Etherscan response shape");
  }
  if (parsed.data.status !== "1") {
    const detail = typeof parsed.data.result === "string" ? parsed.data.result : parsed.data.message;
    const kind = detail && /rate limit/i.test(detail) ? "transient" : "permanent";
    throw new ToolFailure(kind, `Etherscan ${action.action} failed: ${detail ?? "unknown error"}`);
  }
  return parsed.data.result;
}

export async function getEthereumMetrics(signal?: AbortSignal): Promise<string> {
  const key = process.env.ETHERSCAN_API_KEY;
  if (!key) throw notConfigured("Etherscan", "ETHERSCAN_API_KEY");

  const gas = gasOracleSchema.safeParse(await etherscan({ module: "gastracker", action: "gasoracle" }, key, signal));
  if (!gas.success) {
    throw new ToolFailure("permanent", "unexpected Etherscan gas oracle shape");
  }
  const supplyWei = z.coerce.number().safeParse(await etherscan({ module: "stats", action: "ethsupply" }, key, signal));

  const lines = [
    "=== Ethereum On-Chain Metrics ===",
    `  Gas (Gwei): safe ${gas.data.SafeGasPrice}, standard ${gas.data.ProposeGasPrice}, fast ${gas.data.FastGasPrice}`,
    `  Base Fee: ${gas.data.suggestBaseFee.toFixed(2)} Gwei`,
    `  Network Congestion: ${congestion(gas.data.FastGasPrice, 20, 50)}`,
  ];
  if (supplyWei.success) {
    lines.push(`  Total Supply: ${formatCompact(supplyWei.data / 1e18)} ETH`);
  }
  return lines.join("\n");
}

// ── Other chains (CryptoCompare, key required) ───────────────

const cryptoCompareSchema = z.object({
  Response: z.string(),
  Message: z.string().optional(),
  Data: z
    .object({
      symbol: z.string().optional(),
      hashrate: z.number().optional(),
      difficulty: z.number().optional(),
      block_height: z.number().optional(),
      block_time: z.number().optional(),
      transaction_count: z.number().optional(),
      active_addresses: z.number().optional(),
      new_addresses: z.number().optional(),
      large_transaction_count: z.number().optional(),
      average_transaction_value: z.number().optional(),
    })
    .optional(),
});

export async function getGenericMetrics(symbol: string, signal?: AbortSignal): Promise<string> {
  const key = process.env.CRYPTOCOMPARE_API_KEY;
  if (!key) throw notConfigured("CryptoCompare", "CRYPTOCOMPARE_API_KEY");

  const upper = symbol.toUpperCase();
  const raw = await getJson("CryptoCompare", CRYPTOCOMPARE_URL, {
    params: { fsym: upper },
    headers: { authorization: `Apikey ${key}` },
    signal,
  });
  const parsed = cryptoCompareSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ToolFailure("permanent", "unexpected CryptoCompare response shape");
  }
  const data = parsed.data.Data;
  if (parsed.data.Response !== "Success" || !data) {
    throw new ToolFailure("permanent", `No on-chain data for ${upper}: ${parsed.data.Message ?? "not available"}`);
  }

  const metrics: Array<[string, number | undefined]> = [
    ["Active Addresses", data.active_addresses],
    ["New Addresses", data.new_addresses],
    ["Transactions", data.transaction_count],
    ["Large Transactions", data.large_transaction_count],
    ["Average Transaction Value", data.average_transaction_value],
    ["Block Height", data.block_height],
    ["Block Time (s)", data.block_time],
    ["Hash Rate", data.hashrate],
    ["Difficulty", data.difficulty],
  ];
  const lines = [`=== ${upper} On-Chain Metrics ===`];
  for (const [label, value] of metrics) {
    if (value !== undefined) lines.push(`  ${label}: ${formatCompact(value)}`);
  }
  return lines.join("\n");
}
