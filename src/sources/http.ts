import { ToolFailure, errorMessage } from "../errors.js";

export interface RequestOptions {
  params?: Record<string, string | number | undefined>;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export function buildUrl(base: string, params: RequestOptions["params"] = {}): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }
  return url.toString();
}

/**
 * GET a URL and return the raw response body.
 * Network errors, 429 and 5xx are transient; every other non-2xx is permanent.
 */
export async function getText(source: string, base: string, options: RequestOptions = {}): Promise<string> {
  const url = buildUrl(base, options.params);
  let resp: Response;
  try {
    resp = await fetch(url, { headers: options.headers, signal: options.signal });
  } catch (err: unknown) {
    throw new ToolFailure("transient", `${source} request failed: ${errorMessage(err)}`, { cause: err });
  }
  if (!resp.ok) {
    const body = (await resp.text().catch(() => "")).slice(0, 200);
    const kind = resp.status === 429 || resp.status >= 500 ? "transient" : "permanent";
    throw new ToolFailure(kind, `${source} API error ${resp.status}${body ? `: ${body}` : ""}`);
  }
  return resp.text();
}

export async function getJson(source: string, base: string, options: RequestOptions = {}): Promise<unknown> {
  const text = await getText(source, base, options);
  try {
    return JSON.parse(text);
  } catch (err: unknown) {
    throw new ToolFailure("permanent", `${source} returned malformed JSON`, { cause: err });
  }
}

/** Permanent failure for a source whose API key is not set */
export function notConfigured(source: string, envVar: string): ToolFailure {
  return new ToolFailure("permanent", `${source} is not configured: set ${envVar} to enable it`);
}

// ── Formatting ───────────────────────────────────────────────

export function formatUsd(value: number, digits = 2): string {
  return `$${value.toLocaleString("en-US", { minimumFractionDigits: digits, maximumFractionDigits: digits })}`;
}

export function formatPct(value: number): string {
  return `${value >= 0 ? "+" : ""}${value.toFixed(2)}%`;
}

export function formatCompact(value: number): string {
  const abs = Math.abs(value);
  if (abs >= 1e12) return `${(value / 1e12).toFixed(2)}T`;
  if (abs >= 1e9) return `${(value / 1e9).toFixed(2)}B`;
  if (abs >= 1e6) return `${(value / 1e6).toFixed(2)}M`;
  if (abs >= 1e3) return `${(value / 1e3).toFixed(2)}K`;
  return value.toFixed(2);
}
