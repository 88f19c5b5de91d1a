import { supplierReplies, visionReplies } from "./replies.js";
import { startMockAgent, type MockAgent } from "./server.js";

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

const delayMs = parsePositiveInt(process.env.MOCK_AGENT_DELAY_MS, 1500);

const agents: MockAgent[] = await Promise.all([
  startMockAgent({
    port: parsePositiveInt(process.env.VISION_MOCK_PORT, 8081),
    host: "::",
    serviceName: "agent-mock:vision",
    card: {
      name: "Vision Inspection Agent",
      skills: [{ id: "count_objects", name: "Count objects", tags: ["vision", "code-execution"] }],
    },
    reply: visionReplies({ delayMs }),
  }),
  startMockAgent({
    port: parsePositiveInt(process.env.SUPPLIER_MOCK_PORT, 8082),
    host: "::",
    serviceName: "agent-mock:supplier",
    card: {
      name: "Supplier Memory Agent",
      skills: [{ id: "find_supplier", name: "Find supplier", tags: ["inventory", "vector-search"] }],
    },
    reply: supplierReplies({ delayMs }),
  }),
]);

for (const agent of agents) {
  console.log(`[agent-mock] listening on ${agent.baseUrl}`);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    Promise.all(agents.map((agent) => agent.close()))
      .then(() => console.log("[agent-mock] stopped"))
      .catch((error: unknown) => {
        console.error(`[agent-mock] shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
      });
  });
}
