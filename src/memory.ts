import { randomUUID } from "node:crypto";
import { readJsonIfExists, writeJsonAtomic } from "./state.js";
import { ConfigurationError } from "./errors.js";
import { memoryFileSchema, type MemoryRecord, type MemorySource } from "./types.js";

// ── Embedding ────────────────────────────────────────────────

export interface Embedder {
  /** Stored alongside records so a model change triggers re-embedding */
  readonly id: string;
  embed(text: string): number[];
}

/**
 * Deterministic bag-of-words embedding: each token is hashed (FNV-1a) into one
 * of `dims` buckets, and the resulting count vector is L2-normalized.
 */
export class HashingEmbedder implements Embedder {
  readonly id: string;

  constructor(private readonly dims = 256) {
    this.id = `hashing-bow-${dims}`;
  }

  embed(text: string): number[] {
    const vector = new Array<number>(this.dims).fill(0);
    for (const token of tokenize(text)) {
      vector[fnv1a(token) % this.dims] += 1;
    }
    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

function fnv1a(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

// ── Store ────────────────────────────────────────────────────

export interface RetrievedMemory {
  record: MemoryRecord;
  similarity: number;
}

/** Read side used by debate participants */
export interface MemoryRetriever {
  retrieve(situation: string, k: number): readonly RetrievedMemory[];
}

export interface NewMemory {
  situation: string;
  reflection: string;
  outcome: string;
  source?: MemorySource;
}

export interface MemoryStoreOptions {
  embedder?: Embedder;
  now?: () => Date;
  newId?: () => string;
}

export class MemoryStore implements MemoryRetriever {
  // Replaced wholesale on add, so a snapshot taken by retrieve never changes
  private records: readonly MemoryRecord[] = [];
  readonly embedder: Embedder;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(options: MemoryStoreOptions = {}) {
    this.embedder = options.embedder ?? new HashingEmbedder();
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
  }

  get size(): number {
    return this.records.length;
  }

  all(): readonly MemoryRecord[] {
    return this.records;
  }

  /**
   * At most `k` records by descending cosine similarity to `situation`;
   * equal scores keep insertion order.
   */
  retrieve(situation: string, k: number): RetrievedMemory[] {
    const snapshot = this.records;
    if (k <= 0 || snapshot.length === 0) return [];

    const query = this.embedder.embed(situation);
    return snapshot
      .map((record) => ({ record, similarity: cosineSimilarity(query, record.embedding) }))
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, k);
  }

  add(input: NewMemory): MemoryRecord {
    const record: MemoryRecord = Object.freeze({
      id: this.newId(),
      situation: input.situation,
      embedding: Object.freeze(this.embedder.embed(input.situation)),
      reflection: input.reflection,
      outcome: input.outcome,
      ...(input.source ? { source: input.source } : {}),
      created_at: this.now().toISOString(),
    });
    this.records = Object.freeze([...this.records, record]);
    return record;
  }

  async save(filePath: string): Promise<void> {
    await writeJsonAtomic(filePath, {
      embedding_model: this.embedder.id,
      records: this.records,
    });
  }

  /** Load a memory file; a missing file gives an empty store */
  static async load(filePath: string, options: MemoryStoreOptions = {}): Promise<MemoryStore> {
    const store = new MemoryStore(options);
    const raw = await readJsonIfExists(filePath);
    if (raw === null) return store;

    const parsed = memoryFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid memory file ${filePath}`,
        parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      );
    }

    const reembed = parsed.data.embedding_model !== store.embedder.id;
    store.records = Object.freeze(
      parsed.data.records.map((r) =>
        Object.freeze({
          ...r,
          embedding: Object.freeze(reembed ? store.embedder.embed(r.situation) : [...r.embedding]),
        }),
      ),
    );
    return store;
  }
}

/** Prompt block for retrieved reflections */
export function formatReflections(memories: readonly RetrievedMemory[]): string {
  if (memories.length === 0) return "No past reflections available.";
  return memories
    .map((m, i) => `${i + 1}. (outcome: ${m.record.outcome}) ${m.record.reflection}`)
    .join("\n");
}
