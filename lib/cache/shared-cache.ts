import { createLogger, errorMessage } from "@/lib/logger";
import { systemClock, type Clock } from "@/lib/resilience/circuit-breaker";

type CacheEntry = {
  value: string;
  expiresAt: number | null;
};

export type CacheMode = "remote" | "memory";

/**
 * The key-value contract the router and retrieval service depend on. Backend
 * failures are logged and degrade to a miss; they never reach the caller.
 */
export type KeyValueCache = {
  readonly mode: CacheMode;
  getString(key: string): Promise<string | null>;
  setString(key: string, value: string, ttlSeconds?: number): Promise<void>;
  getJson<T>(key: string): Promise<T | null>;
  setJson(key: string, value: unknown, ttlSeconds?: number): Promise<void>;
  del(key: string): Promise<void>;
  deleteByPrefix(prefix: string): Promise<number>;
};

const REMOTE_TIMEOUT_MS = Math.max(200, Number(process.env.CACHE_REMOTE_TIMEOUT_MS ?? "2000"));
const SCAN_BATCH = 200;

const log = createLogger("shared-cache");

function parseTtlSeconds(ttlSeconds: number | undefined): number | null {
  if (!Number.isFinite(ttlSeconds) || !ttlSeconds || ttlSeconds <= 0) {
    return null;
  }
  return Math.floor(ttlSeconds);
}

function escapeMatchPattern(prefix: string): string {
  return prefix.replace(/[*?[\]\\]/g, (char) => `\\${char}`);
}

function parseScanResult(result: unknown): { cursor: string; keys: string[] } {
  if (!Array.isArray(result) || result.length < 2) {
    return { cursor: "0", keys: [] };
  }
  const [cursor, keys] = result;
  return {
    cursor: String(cursor),
    keys: Array.isArray(keys) ? keys.filter((key): key is string => typeof key === "string") : [],
  };
}

/**
 * Upstash-style Redis REST cache with an in-process fallback map. Every write
 * also lands in the map, so a remote outage mid-request still serves what this
 * process wrote.
 */
export class SharedCache implements KeyValueCache {
  private readonly restUrl: string;

  private readonly restToken: string;

  private readonly clock: Clock;

  private readonly memoryStore = new Map<string, CacheEntry>();

  constructor(input?: { restUrl?: string; restToken?: string; clock?: Clock }) {
    this.restUrl = (input?.restUrl ?? process.env.UPSTASH_REDIS_REST_URL ?? "").trim().replace(/\/+$/, "");
    this.restToken = (input?.restToken ?? process.env.UPSTASH_REDIS_REST_TOKEN ?? "").trim();
    this.clock = input?.clock ?? systemClock;
  }

  get mode(): CacheMode {
    return this.remoteEnabled ? "remote" : "memory";
  }

  private get remoteEnabled(): boolean {
    return this.restUrl.length > 0 && this.restToken.length > 0;
  }

  private isExpired(entry: CacheEntry | undefined): boolean {
    if (!entry) return true;
    if (entry.expiresAt === null) return false;
    return entry.expiresAt <= this.clock.now();
  }

  private readMemory(key: string): string | null {
    const current = this.memoryStore.get(key);
    if (this.isExpired(current)) {
      this.memoryStore.delete(key);
      return null;
    }
    return current?.value ?? null;
  }

  private async callRedis(command: string, args: string[]): Promise<unknown> {
    const path = [command, ...args].map((part) => encodeURIComponent(part)).join("/");
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), REMOTE_TIMEOUT_MS);

    try {
      const response = await fetch(`${this.restUrl}/${path}`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.restToken}`,
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`Shared cache HTTP ${response.status}`);
      }

      const payload = (await response.json()) as { result?: unknown; error?: unknown };
      if (typeof payload.error === "string") {
        throw new Error(`Shared cache error: ${payload.error}`);
      }
      return payload.result ?? null;
    } finally {
      clearTimeout(timeout);
    }
  }

  async getString(key: string): Promise<string | null> {
    if (this.remoteEnabled) {
      try {
        const result = await this.callRedis("GET", [key]);
        return typeof result === "string" ? result : null;
      } catch (error) {
        log.warn("remote get failed, using memory", { key, error: errorMessage(error) });
      }
    }

    return this.readMemory(key);
  }

  async setString(key: string, value: string, ttlSeconds?: number): Promise<void> {
    const ttl = parseTtlSeconds(ttlSeconds);

    if (this.remoteEnabled) {
      try {
        const args = ttl ? [key, value, "EX", String(ttl)] : [key, value];
        await this.callRedis("SET", args);
      } catch (error) {
        log.warn("remote set failed, using memory", { key, error: errorMessage(error) });
      }
    }

    this.memoryStore.set(key, {
      value,
      expiresAt: ttl ? this.clock.now() + ttl * 1000 : null,
    });
  }

  async del(key: string): Promise<void> {
    if (this.remoteEnabled) {
      try {
        await this.callRedis("DEL", [key]);
      } catch (error) {
        log.warn("remote delete failed", { key, error: errorMessage(error) });
      }
    }
    this.memoryStore.delete(key);
  }

  async deleteByPrefix(prefix: string): Promise<number> {
    let removed = 0;

    if (this.remoteEnabled) {
      try {
        let cursor = "0";
        do {
          const page = parseScanResult(
            await this.callRedis("SCAN", [cursor, "MATCH", `${escapeMatchPattern(prefix)}*`, "COUNT", String(SCAN_BATCH)]),
          );
          cursor = page.cursor;
          if (page.keys.length > 0) {
            const deleted = await this.callRedis("DEL", page.keys);
            removed += typeof deleted === "number" ? deleted : 0;
          }
        } while (cursor !== "0");
      } catch (error) {
        log.warn("remote prefix delete failed", { prefix, error: errorMessage(error) });
      }
    }

    let memoryRemoved = 0;
    for (const key of [...this.memoryStore.keys()]) {
      if (key.startsWith(prefix)) {
        this.memoryStore.delete(key);
        memoryRemoved += 1;
      }
    }

    const total = this.remoteEnabled ? removed : memoryRemoved;
    log.info("cache prefix invalidated", { prefix, removed: total });
    return total;
  }

  async getJson<T>(key: string): Promise<T | null> {
    const raw = await this.getString(key);
    if (!raw) return null;
    try {
      return JSON.parse(raw) as T;
    } catch (error) {
      log.warn("cached value is not JSON, ignoring", { key, error: errorMessage(error) });
      return null;
    }
  }

  async setJson(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    await this.setString(key, JSON.stringify(value), ttlSeconds);
  }
}
