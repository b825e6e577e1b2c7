import { z } from "zod";
import { ToolFailure } from "../errors.js";
import { formatCompact, formatPct, getJson } from "./http.js";

const DEFILLAMA_URL = "https://api.llama.fi/v2";

const chainsSchema = z.array(
  z.object({
    name: z.string(),
    tvl: z.number(),
    tokenSymbol: z.string().nullable().optional(),
  }),
);

const historySchema = z.array(z.object({ date: z.number(), tvl: z.number() }));

function changeOver(history: z.infer<typeof historySchema>, days: number): number | null {
  if (history.length <= days) return null;
  const latest = history[history.length - 1].tvl;
  const past = history[history.length - 1 - days].tvl;
  return past === 0 ? null : ((latest - past) / past) * 100;
}

/** TVL of the chain whose native token is `symbol` */
export async function getChainTvl(symbol: string, signal?: AbortSignal): Promise<string> {
  const upper = symbol.toUpperCase();
  const chains = chainsSchema.safeParse(await getJson("DefiLlama", `${DEFILLAMA_URL}/chains`, { signal }));
  if (!chains.success) {
    throw new ToolFailure("permanent", "unexpected DefiLlama chains response shape");
  }
  const ranked = [...chains.data].sort((a, b) => b.tvl - a.tvl);
  const index = ranked.findIndex((c) => c.tokenSymbol?.toUpperCase() === upper);
  if (index < 0) {
    throw new ToolFailure("permanent", `No DeFi chain found for ${upper}`);
  }
  const chain = ranked[index];

  const history = historySchema.safeParse(
    await getJson("DefiLlama", `${DEFILLAMA_URL}/historicalChainTvl/${encodeURIComponent(chain.name)}`, { signal }),
  );

  const lines = [
    `=== ${chain.name} DeFi Metrics ===`,
    `  TVL: $${formatCompact(chain.tvl)}`,
    `  TVL Rank: #${index + 1} of ${ranked.length} chains`,
  ];
  if (history.success) {
    for (const days of [7, 30]) {
      const change = changeOver(history.data, days);
      if (change !== null) lines.push(`  ${days}d TVL Change: ${formatPct(change)}`);
    }
  }
  return lines.join("\n");
}
