import "dotenv/config";
import { loadConfig, loadFeeds } from "./config.js";
import { MaintenanceScheduler, runMaintenance } from "./maintenance.js";
import { createServices } from "./services.js";

async function main() {
  const config = loadConfig();
  const { feedService, sweeper } = await createServices(config);

  const maintenance = new MaintenanceScheduler(async () =>
    runMaintenance(feedService, sweeper, loadFeeds(config.feedsPath)),
  );
  maintenance.start(config.maintenanceCron);

  await maintenance.tick();
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
