import "dotenv/config";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createScoringEngines } from "./engine";
import { createLogger, setLogLevel } from "./logger";

const log = createLogger("server");

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const engines = createScoringEngines(config.scoring, {
    logger: createLogger("scoring"),
  });
  const app = createApp({ engines, logger: createLogger("http") });

  await new Promise<void>((resolve, reject) => {
    const server = app.listen(config.port, () => {
      log.info(`Server ready on http://localhost:${config.port}`, {
        heartLabelStyle: config.scoring.heartLabelStyle,
        alzheimerStrategy: config.scoring.alzheimerStrategy,
      });
      resolve();
    });
    server.on("error", reject);
  });
}

main().catch((err) => {
  log.error("Fatal server error", {
    error: err instanceof Error ? err.message : String(err),
  });
  process.exit(1);
});
