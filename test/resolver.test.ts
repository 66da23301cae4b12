import { beforeEach, describe, expect, it } from "vitest";
import type { AgentDirectory, AgentEntry } from "../src/seqflow/agents/directory.js";
import { AgentNameResolver } from "../src/seqflow/agents/resolver.js";
import { silentLogger } from "../src/seqflow/logger.js";

class StaticDirectory implements AgentDirectory {
  calls = 0;

  constructor(public agents: AgentEntry[]) {}

  async listAgents(): Promise<AgentEntry[]> {
    this.calls += 1;
    return this.agents.map((agent) => ({ ...agent }));
  }
}

describe("AgentNameResolver", () => {
  let directory: StaticDirectory;
  let resolver: AgentNameResolver;

  beforeEach(() => {
    directory = new StaticDirectory([{ name: "writer", id: "abc-123" }]);
    resolver = new AgentNameResolver(directory, silentLogger);
  });

  it("loads the directory lazily and caches it", async () => {
    expect(directory.calls).toBe(0);

    expect(await resolver.resolve("writer")).toBe("abc-123");
    expect(await resolver.resolve("writer")).toBe("abc-123");

    expect(directory.calls).toBe(1);
    expect(resolver.refreshes).toBe(1);
  });

  it("refreshes the whole cache once on a miss", async () => {
    await resolver.resolve("writer");

    // server restarted: ids re-issued, a new agent appeared
    directory.agents = [
      { name: "writer", id: "def-456" },
      { name: "editor", id: "ed-1" }
    ];

    const resolved = await resolver.resolveAll(["editor"]);
    expect(resolved).toEqual(new Map([["editor", "ed-1"]]));
    expect(await resolver.resolve("writer")).toBe("def-456");
    expect(directory.calls).toBe(2);
  });

  it("fails with AGENT_NOT_FOUND after one refresh", async () => {
    await resolver.resolve("writer");

    await expect(resolver.resolveAll(["ghost", "phantom", "ghost"])).rejects.toMatchObject({
      code: "AGENT_NOT_FOUND",
      message: "Unknown agents: ghost, phantom",
      details: { agents: ["ghost", "phantom"], available: ["writer"] }
    });
    expect(directory.calls).toBe(2);
  });

  it("does not refresh twice when the cache was just loaded", async () => {
    await expect(resolver.resolve("ghost")).rejects.toMatchObject({
      code: "AGENT_NOT_FOUND",
      message: "Unknown agent: ghost"
    });
    expect(directory.calls).toBe(1);
  });

  it("resolves all names or none", async () => {
    directory.agents.push({ name: "editor", id: "ed-1" });

    await expect(resolver.resolveAll(["writer", "ghost"])).rejects.toMatchObject({ code: "AGENT_NOT_FOUND" });

    const resolved = await resolver.resolveAll(["writer", "editor"]);
    expect([...resolved]).toEqual([
      ["writer", "abc-123"],
      ["editor", "ed-1"]
    ]);
  });

  it("shares one directory request between concurrent refreshes", async () => {
    const [first, second] = await Promise.all([resolver.refresh(), resolver.refresh()]);

    expect(first).toBe(second);
    expect(directory.calls).toBe(1);
  });

  it("lists known agents", async () => {
    directory.agents.push({ name: "editor", id: "ed-1" });
    expect(await resolver.knownAgents()).toEqual(["writer", "editor"]);
  });
});
