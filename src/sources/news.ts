import { z } from "zod";
import { ToolFailure } from "../errors.js";
import { getJson, notConfigured } from "./http.js";

const CRYPTOPANIC_URL = "https://cryptopanic.com/api/v1/posts/";

export const REGULATORY_KEYWORDS = [
  "sec",
  "regulation",
  "regulatory",
  "ban",
  "legal",
  "lawsuit",
  "compliance",
  "government",
  "legislation",
  "policy",
  "etf",
  "securities",
  "cftc",
  "congress",
  "senate",
  "court",
];

const postsSchema = z.object({
  results: z.array(
    z.object({
      title: z.string(),
      url: z.string().optional(),
      published_at: z.string(),
      source: z.object({ title: z.string() }).optional(),
      votes: z
        .object({
          positive: z.number().default(0),
          negative: z.number().default(0),
          important: z.number().default(0),
        })
        .optional(),
      currencies: z.array(z.object({ code: z.string() })).optional(),
    }),
  ),
});

export type NewsPost = z.infer<typeof postsSchema>["results"][number];

export async function fetchPosts(
  params: { currencies?: string; filter?: string },
  signal?: AbortSignal,
): Promise<NewsPost[]> {
  const key = process.env.CRYPTOPANIC_API_KEY;
  if (!key) throw notConfigured("CryptoPanic", "CRYPTOPANIC_API_KEY");

  const raw = await getJson("CryptoPanic", CRYPTOPANIC_URL, {
    params: { auth_token: key, public: "true", ...params },
    signal,
  });
  const parsed = postsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ToolFailure("permanent", "unexpected CryptoPanic response shape");
  }
  return parsed.data.results;
}

/** Posts newer than `hours` before `now` */
export function withinHours(posts: NewsPost[], hours: number, now: Date): NewsPost[] {
  const cutoff = now.getTime() - hours * 3_600_000;
  return posts.filter((p) => {
    const ts = Date.parse(p.published_at);
    return Number.isNaN(ts) || ts >= cutoff;
  });
}

export function isRegulatory(post: NewsPost): boolean {
  const words = post.title.toLowerCase().split(/[^a-z0-9]+/);
  return REGULATORY_KEYWORDS.some((k) => words.includes(k));
}

export function formatPosts(title: string, posts: NewsPost[]): string {
  if (posts.length === 0) return `${title}\n  No articles in this window.`;
  const lines = [title];
  posts.forEach((p, i) => {
    const source = p.source ? ` (${p.source.title})` : "";
    const votes = p.votes ? ` [+${p.votes.positive}/-${p.votes.negative}]` : "";
    lines.push(`${i + 1}. ${p.title}${source}${votes}`, `   ${p.published_at.slice(0, 16)}`);
  });
  return lines.join("\n");
}

export async function getCryptoNews(
  symbol: string,
  hours: number,
  limit: number,
  signal?: AbortSignal,
  now: Date = new Date(),
): Promise<string> {
  const upper = symbol.toUpperCase();
  const posts = withinHours(await fetchPosts({ currencies: upper }, signal), hours, now).slice(0, limit);
  return formatPosts(`=== ${upper} News (last ${hours}h) ===`, posts);
}

export async function getRegulatoryNews(
  hours: number,
  limit: number,
  signal?: AbortSignal,
  now: Date = new Date(),
): Promise<string> {
  const posts = withinHours(await fetchPosts({ filter: "important" }, signal), hours, now)
    .filter(isRegulatory)
    .slice(0, limit);
  return formatPosts(`=== Regulatory News (last ${hours}h) ===`, posts);
}
