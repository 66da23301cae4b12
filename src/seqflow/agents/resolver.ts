/**
 * Agent name -> remote id resolution.
 *
 * Servers re-issue agent ids when they restart, so ids are never stored in
 * the workflow model. The cache belongs to one resolver (one per client),
 * is filled lazily and is always replaced as a whole when a name misses.
 */

import { SeqflowError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { AgentDirectory } from "./directory.js";

function missingNames(cache: ReadonlyMap<string, string>, names: readonly string[]): string[] {
  return [...new Set(names.filter(name => !cache.has(name)))];
}

export class AgentNameResolver {
  private cache: Map<string, string> | null = null;
  private inflight: Promise<Map<string, string>> | null = null;
  private refreshCount = 0;

  constructor(
    private readonly directory: AgentDirectory,
    private readonly logger: Logger
  ) {}

  /** Number of directory fetches so far. */
  get refreshes(): number {
    return this.refreshCount;
  }

  /**
   * Fetch the directory and replace the cache. Concurrent callers share
   * one request.
   */
  async refresh(): Promise<Map<string, string>> {
    if (this.inflight) return this.inflight;

    this.inflight = (async () => {
      try {
        const entries = await this.directory.listAgents();
        const next = new Map<string, string>();
        for (const entry of entries) {
          next.set(entry.name, entry.id);
        }
        this.cache = next;
        this.refreshCount += 1;
        this.logger.debug("Agent directory refreshed", { agents: next.size });
        return next;
      } finally {
        this.inflight = null;
      }
    })();

    return this.inflight;
  }

  async resolve(name: string): Promise<string> {
    const resolved = await this.resolveAll([name]);
    const id = resolved.get(name);
    if (id === undefined) {
      // unreachable: resolveAll throws on a missing name
      throw new SeqflowError("AGENT_NOT_FOUND", `Agent '${name}' not found`, { agents: [name] });
    }
    return id;
  }

  /**
   * Resolve every name or none: a single unknown name fails the call.
   */
  async resolveAll(names: readonly string[]): Promise<Map<string, string>> {
    const fresh = this.cache === null;
    let cache: Map<string, string> = this.cache ?? (await this.refresh());

    let missing = missingNames(cache, names);
    if (missing.length > 0 && !fresh) {
      this.logger.info("Agent lookup missed, refreshing directory", { missing });
      cache = await this.refresh();
      missing = missingNames(cache, names);
    }

    if (missing.length > 0) {
      throw new SeqflowError(
        "AGENT_NOT_FOUND",
        `Unknown agent${missing.length > 1 ? "s" : ""}: ${missing.join(", ")}`,
        { agents: missing, available: [...cache.keys()] }
      );
    }

    const resolved = new Map<string, string>();
    for (const name of names) {
      const id = cache.get(name);
      if (id !== undefined) resolved.set(name, id);
    }
    return resolved;
  }

  /** Names known to the server, loading the directory if needed. */
  async knownAgents(): Promise<string[]> {
    const cache = this.cache ?? (await this.refresh());
    return [...cache.keys()];
  }
}
