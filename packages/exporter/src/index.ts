import { pino } from "pino";
import { buildApp } from "./app.js";
import { loadConfig, type ExporterConfig } from "./config/config.js";

// Configuration problems are fatal: log and exit before listening
let config: ExporterConfig;
try {
  config = await loadConfig();
} catch (err) {
  pino({ name: "usgs-exporter" }).fatal({ err }, "Failed to load configuration");
  process.exit(1);
}

const app = await buildApp({ config });

// Graceful shutdown
for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info(`Received ${signal}, shutting down`);
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error(err);
        process.exit(1);
      },
    );
  });
}

// Start
try {
  await app.listen({ port: config.port, host: config.host });
  app.log.info(`USGS exporter listening on ${config.host}:${config.port}`);
} catch (err) {
  app.log.error(err);
  process.exit(1);
}
