import { beforeEach, describe, expect, it } from "vitest";
import { WorkflowClient } from "../src/seqflow/client.js";
import { silentLogger } from "../src/seqflow/logger.js";
import { Workflow } from "../src/seqflow/workflow/workflow.js";
import { FakeWorkflowServer, WORKFLOWS } from "./helpers/fakeServer.js";

describe("WorkflowRegistrar", () => {
  let server: FakeWorkflowServer;
  let client: WorkflowClient;

  const haiku = () => new Workflow("w1").addStep("s1", "writer", "Write a haiku");

  beforeEach(() => {
    server = new FakeWorkflowServer();
    server.agents = [{ name: "writer", id: "abc-123" }];
    client = new WorkflowClient({ fetch: server.fetch, logger: silentLogger });
  });

  it("posts the definition with resolved agent ids", async () => {
    const workflow = haiku();
    const report = await client.register(workflow);

    expect(report).toEqual({ workflowId: "w1", replaced: false, verified: false, httpCalls: 1 });
    expect(server.requests({ includeAgents: true })).toEqual(["GET /api/v1/agents", `POST ${WORKFLOWS}`]);

    const stored = server.workflows.get("w1");
    expect(stored?.steps).toEqual([expect.objectContaining({ step_id: "s1", agent_id: "abc-123" })]);
    expect(workflow.isSealed).toBe(true);
  });

  it("replaces a stale definition: 409 -> DELETE 404 -> POST 201", async () => {
    server.respondOnce("POST", WORKFLOWS, 409, { success: false, error: "already exists" });
    server.respondOnce("DELETE", `${WORKFLOWS}/w1`, 404, { success: false, error: "not found" });

    const report = await client.register(haiku());

    expect(report).toEqual({ workflowId: "w1", replaced: true, verified: false, httpCalls: 3 });
    expect(server.requests()).toEqual([`POST ${WORKFLOWS}`, `DELETE ${WORKFLOWS}/w1`, `POST ${WORKFLOWS}`]);
  });

  it("registering twice never surfaces a conflict", async () => {
    const workflow = haiku();
    await client.register(workflow);
    const second = await client.register(workflow);

    expect(second.replaced).toBe(true);
    expect(second.httpCalls).toBe(3);
    expect(server.workflows.size).toBe(1);
  });

  it("keeps the existing definition with onConflict: accept", async () => {
    server.seed("w1");

    const report = await client.register(haiku(), { onConflict: "accept" });

    expect(report).toEqual({ workflowId: "w1", replaced: false, verified: false, httpCalls: 1 });
    expect(server.requests()).toEqual([`POST ${WORKFLOWS}`]);
  });

  it("sends nothing when an agent cannot be resolved", async () => {
    const workflow = new Workflow("w1").addStep("s1", "writer", "Write").addStep("s2", "ghost", "Haunt");

    await expect(client.register(workflow)).rejects.toMatchObject({
      code: "UNRESOLVED_AGENT",
      details: { agents: ["ghost"], available: ["writer"] }
    });
    expect(server.requests()).toEqual([]);
    expect(workflow.isSealed).toBe(false);
  });

  it("rejects an empty workflow before any request", async () => {
    await expect(client.register(new Workflow("w1"))).rejects.toMatchObject({ code: "INVALID_WORKFLOW" });
    expect(server.requests({ includeAgents: true })).toEqual([]);
  });

  it("fails on an unexpected create status", async () => {
    server.respondOnce("POST", WORKFLOWS, 500, { success: false, error: "disk full" });

    await expect(client.register(haiku())).rejects.toMatchObject({
      code: "REGISTRATION_FAILED",
      message: "Workflow registration failed: HTTP 500",
      details: { workflowId: "w1", status: 500, serverMessage: "disk full", httpCalls: 1 }
    });
  });

  it("fails when DELETE does not clear the conflict", async () => {
    server.respondOnce("POST", WORKFLOWS, 409);
    server.respondOnce("DELETE", `${WORKFLOWS}/w1`, 500, { success: false, error: "locked" });

    await expect(client.register(haiku())).rejects.toMatchObject({
      code: "REGISTRATION_FAILED",
      message: "DELETE of existing workflow failed: HTTP 500",
      details: { httpCalls: 2, serverMessage: "locked" }
    });
  });

  it("never posts a third time", async () => {
    server.respondOnce("POST", WORKFLOWS, 409);
    server.respondOnce("POST", WORKFLOWS, 409);

    await expect(client.register(haiku())).rejects.toMatchObject({
      code: "REGISTRATION_FAILED",
      message: "Re-registration after cleanup failed: HTTP 409",
      details: { httpCalls: 3 }
    });
    expect(server.requests().filter((call) => call.startsWith("POST"))).toHaveLength(2);
  });

  it("verifies the definition when asked", async () => {
    const report = await client.register(haiku(), { verify: true });

    expect(report).toEqual({ workflowId: "w1", replaced: false, verified: true, httpCalls: 2 });
    expect(server.requests()).toEqual([`POST ${WORKFLOWS}`, `GET ${WORKFLOWS}/w1`]);
  });

  it("fails when the definition is missing right after creation", async () => {
    server.respondOnce("GET", `${WORKFLOWS}/w1`, 404, { success: false, error: "not found" });
    const workflow = haiku();

    await expect(client.register(workflow, { verify: true })).rejects.toMatchObject({
      code: "REGISTRATION_FAILED",
      message: "Workflow not found right after registration: HTTP 404"
    });
    expect(workflow.isSealed).toBe(false);
  });

  it("takes conflict policy and verification defaults from config", async () => {
    const strict = new WorkflowClient({
      fetch: server.fetch,
      logger: silentLogger,
      config: { onConflict: "accept", verifyRegistration: true }
    });
    server.seed("w1");

    const report = await strict.register(haiku());

    expect(report).toEqual({ workflowId: "w1", replaced: false, verified: false, httpCalls: 1 });
  });
});
