import cron, { type ScheduledTask } from "node-cron";
import { FeedSource } from "./config.js";
import { ConfigError } from "./core/errors.js";
import { FeedService } from "./core/feed-service.js";
import { TtlSweeper, nowSeconds } from "./stores/ttl-sweeper.js";

export interface MaintenanceReport {
  refreshed: number;
  failed: number;
  downgraded: number;
  purged: Record<string, number>;
}

// Order matters: lapsed pledges must be seen by the downgrade sweep before
// the TTL sweep removes them.
export async function runMaintenance(
  feedService: FeedService,
  sweeper: TtlSweeper,
  sources: FeedSource[],
  now = nowSeconds(),
): Promise<MaintenanceReport> {
  let refreshed = 0;
  let failed = 0;

  for (const source of sources) {
    try {
      await feedService.createFeed(source.userId, source);
      refreshed++;
    } catch (err) {
      failed++;
      console.error(`Refresh failed for ${source.url} (user ${source.userId}):`, err);
    }
  }

  const downgraded = await feedService.sweepLapsedPledges(now);
  const purged = await sweeper.runOnce(now);

  return { refreshed, failed, downgraded, purged };
}

export function describeReport(report: MaintenanceReport): string {
  const purged = Object.entries(report.purged).map(([name, count]) => `${name}=${count}`).join(", ");
  return (
    `Maintenance done: ${report.refreshed} refreshed, ${report.failed} failed, ` +
    `${report.downgraded} downgraded, purged ${purged}`
  );
}

/**
 * Runs a maintenance job on a cron schedule, skipping ticks while one is in
 * flight. Logs go to stderr: the MCP server owns stdout.
 */
export class MaintenanceScheduler {
  private task: ScheduledTask | null = null;
  private running = false;

  constructor(private job: () => Promise<MaintenanceReport>) {}

  start(schedule: string): void {
    if (this.task) return;
    if (!cron.validate(schedule)) throw new ConfigError(`invalid maintenance schedule: ${schedule}`);
    this.task = cron.schedule(schedule, () => void this.tick());
    console.error(`Maintenance scheduled: ${schedule}`);
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
    }
  }

  async tick(): Promise<MaintenanceReport | null> {
    if (this.running) return null;
    this.running = true;
    try {
      const report = await this.job();
      console.error(describeReport(report));
      return report;
    } catch (err) {
      console.error("Maintenance failed:", err);
      return null;
    } finally {
      this.running = false;
    }
  }
}
