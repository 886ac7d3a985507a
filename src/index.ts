import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { loadConfig } from "./config.js";
import { MaintenanceScheduler, runMaintenance } from "./maintenance.js";
import { createServices } from "./services.js";
import { registerTools } from "./mcp/tools.js";

// ── Start ───────────────────────────────────────────────────────

async function main() {
  const config = loadConfig();
  const { feedService, sweeper, close } = await createServices(config);

  const server = new McpServer({
    name: "vidcast",
    version: "1.0.0",
  });
  registerTools(server, feedService);

  // The server keeps no feeds file: its job only downgrades lapsed pledges
  // and then purges expired records.
  const maintenance = new MaintenanceScheduler(async () => runMaintenance(feedService, sweeper, []));
  maintenance.start(config.maintenanceCron);

  process.on("SIGINT", () => {
    maintenance.stop();
    close()
      .catch((err) => console.error("Shutdown failed:", err))
      .finally(() => process.exit(0));
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
