import { ToolFailure } from "../errors.js";
import { getGlobalMarket, getPriceData } from "./coingecko.js";
import { getBitcoinMetrics, getEthereumMetrics, getGenericMetrics } from "./onchain.js";
import { getCryptoNews } from "./news.js";

const SEPARATOR = "=".repeat(80);
const NEWS_HOURS = 48;
const NEWS_LIMIT = 5;

export interface AnalysisSection {
  title: string;
  fetch: () => Promise<string>;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Fetches every section concurrently and joins them in order. A failed
 * section is replaced by a one-line notice; only when all fail does the
 * whole call fail.
 */
export async function composeFullAnalysis(symbol: string, sections: AnalysisSection[]): Promise<string> {
  const settled = await Promise.allSettled(sections.map((s) => s.fetch()));
  const failures: unknown[] = settled.flatMap((r) => (r.status === "rejected" ? [r.reason] : []));

  if (failures.length === sections.length) {
    const transient = failures.some((f) => f instanceof ToolFailure && f.kind === "transient");
    throw new ToolFailure(
      transient ? "transient" : "permanent",
      `full analysis for ${symbol.toUpperCase()} failed: ${failures.map(errorMessage).join("; ")}`,
    );
  }

  const parts = settled.map((r, i) =>
    r.status === "fulfilled" ? r.value : `[${sections[i].title} unavailable: ${errorMessage(r.reason)}]`,
  );
  return parts.join(`\n\n${SEPARATOR}\n`);
}

function onchainSection(symbol: string, signal?: AbortSignal): () => Promise<string> {
  switch (symbol.toUpperCase()) {
    case "BTC":
      return () => getBitcoinMetrics(signal);
    case "ETH":
      return () => getEthereumMetrics(signal);
    default:
      return () => getGenericMetrics(symbol, signal);
  }
}

/** Price and history, on-chain metrics, the last 48h of news and the global market in one report */
export function getFullAnalysis(symbol: string, days: number, signal?: AbortSignal): Promise<string> {
  return composeFullAnalysis(symbol, [
    { title: "Price data", fetch: () => getPriceData(symbol, days, signal) },
    { title: "On-chain metrics", fetch: onchainSection(symbol, signal) },
    { title: "News", fetch: () => getCryptoNews(symbol, NEWS_HOURS, NEWS_LIMIT, signal) },
    { title: "Global market", fetch: () => getGlobalMarket(signal) },
  ]);
}
