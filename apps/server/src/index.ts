import dotenv from "dotenv";
import { loadConfig } from "./config";
import { RefreshCoordinator } from "./refreshCoordinator";
import { RefreshScheduler } from "./refreshScheduler";
import { createServer } from "./server";
import { SnapshotBuilder } from "./snapshotBuilder";
import { SnapshotCache } from "./snapshotCache";
import { createYahooQuoteProvider } from "./yahoo";

dotenv.config();

function bootstrap() {
  try {
    const config = loadConfig();
    const symbols = config.trackedSymbols.map((tracked) => tracked.symbol);
    const companyNames = Object.fromEntries(config.trackedSymbols.map((tracked) => [tracked.symbol, tracked.name]));

    const builder = new SnapshotBuilder({
      provider: createYahooQuoteProvider({ companyNames }),
      fetchTimeoutMs: config.fetchTimeoutMs,
      maxRetries: config.maxRetries,
      retryDelayMs: config.retryDelayMs,
      maxStaleAgeMs: config.maxStaleAgeMs
    });
    const cache = new SnapshotCache();
    const coordinator = new RefreshCoordinator({ builder, cache, symbols });
    const scheduler = new RefreshScheduler(coordinator, config.refreshIntervalSeconds);

    const app = createServer({ config, cache, coordinator, scheduler });
    const server = app.listen(config.port, config.host, () => {
      console.log(`Tech Stock Tracker listening on http://${config.host}:${config.port}`);
      console.log(`Tracking ${symbols.join(", ")}`);
    });
    scheduler.start();

    const shutdown = () => {
      scheduler.stop();
      server.close(() => process.exit(0));
    };
    process.on("SIGTERM", shutdown);
    process.on("SIGINT", shutdown);
  } catch (error) {
    console.error("Failed to start server", error);
    process.exit(1);
  }
}

bootstrap();
