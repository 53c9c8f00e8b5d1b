import { createApp, createDependencies } from "./app";
import { ServerLifecycle } from "./lifecycle";
import { Env } from "./env";

async function main(): Promise<void> {
  const deps = createDependencies();
  const lifecycle = new ServerLifecycle(createApp(deps), deps, {
    host: Env.HOST,
    port: Env.PORT,
    announcePrefix: Env.PORT_ANNOUNCE_PREFIX,
    enableMonitoring: Env.ENABLE_CONNECTION_MONITORING,
    monitoringIntervalSeconds: Env.MONITORING_INTERVAL,
    shutdownTimeoutMs: Env.SHUTDOWN_TIMEOUT_MS
  });

  const port = await lifecycle.start();
  console.log(`${Env.SERVICE_NAME} listening on ${Env.HOST}:${port}`);

  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`Received ${signal}`);
    lifecycle
      .stop()
      .then(() => process.exit(0))
      .catch((err) => {
        console.error(err);
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error(`Fatal: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
