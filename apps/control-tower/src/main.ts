import { AgentClient } from "@sct/a2a";
import { errorMessage, RollingMetrics } from "@sct/contracts";
import { EventBroadcaster } from "./broadcaster.js";
import { loadControlTowerConfig } from "./config.js";
import { preparePayload } from "./payload.js";
import { RunRegistry } from "./run-registry.js";
import { createControlTowerServer } from "./server.js";
import { WorkflowOrchestrator } from "./workflow.js";

const config = loadControlTowerConfig();
const metrics = new RollingMetrics();
const broadcaster = new EventBroadcaster();
const registry = new RunRegistry({ retentionMs: config.runRetentionMs, maxEntries: config.runMaxEntries });
const orchestrator = new WorkflowOrchestrator({
  config,
  agents: new AgentClient({ discoveryTimeoutMs: config.discoveryTimeoutMs }),
  publisher: broadcaster,
  preparePayload,
  registry,
  metrics,
});
const controlTower = createControlTowerServer({ config, orchestrator, broadcaster, registry, metrics });

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  console.log(`[control-tower] ${signal} received; draining ${orchestrator.activeRuns} run(s)`);
  controlTower.beginDrain();
  const idle = await orchestrator.waitForIdle(config.shutdownGraceMs);
  if (!idle) {
    console.warn(`[control-tower] runs still in flight after ${config.shutdownGraceMs}ms; closing anyway`);
  }
  await controlTower.close();
  console.log("[control-tower] stopped");
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      console.error(`[control-tower] shutdown failed: ${errorMessage(error)}`);
      process.exitCode = 1;
    });
  });
}

try {
  const port = await controlTower.listen(config.port);
  console.log(`[control-tower] listening on :${port}`);
  console.log(`[control-tower] websocket endpoint ws://localhost:${port}/ws`);
  console.log(`[control-tower] vision agent ${config.visionAgentUrl}, supplier agent ${config.supplierAgentUrl}`);
} catch (error) {
  console.error(`[control-tower] failed to start: ${errorMessage(error)}`);
  process.exitCode = 1;
}
