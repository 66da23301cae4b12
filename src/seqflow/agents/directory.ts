import { z } from "zod";
import { SeqflowError } from "../errors.js";
import { describeErrorBody, unwrapEnvelope, type HttpTransport } from "../http/transport.js";

export type AgentEntry = {
  name: string;
  id: string;
};

/**
 * Source of the server's current agent line-up.
 */
export interface AgentDirectory {
  listAgents(): Promise<AgentEntry[]>;
}

const AgentEntrySchema = z.object({
  name: z.string().min(1),
  id: z.string().min(1)
});

/**
 * Keep the entries that carry a usable name and id; skip the rest.
 */
export function parseAgentList(body: unknown): AgentEntry[] {
  const payload = unwrapEnvelope(body);
  if (!Array.isArray(payload)) return [];

  const entries: AgentEntry[] = [];
  for (const item of payload) {
    const parsed = AgentEntrySchema.safeParse(item);
    if (parsed.success) {
      entries.push({ name: parsed.data.name, id: parsed.data.id });
    }
  }
  return entries;
}

/**
 * GET /agents against the workflow server.
 */
export class HttpAgentDirectory implements AgentDirectory {
  constructor(private readonly transport: HttpTransport) {}

  async listAgents(): Promise<AgentEntry[]> {
    const url = this.transport.apiUrl("/agents");
    const response = await this.transport.requestJson("GET", url);
    if (!response.ok) {
      throw new SeqflowError(
        "TRANSPORT_ERROR",
        `Agent directory request failed: HTTP ${response.status}`,
        { status: response.status, message: describeErrorBody(response.body) }
      );
    }
    return parseAgentList(response.body);
  }
}
