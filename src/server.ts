import { createApp } from "./app.js";
import { closeResources, createClientFromEnv } from "./config/client.js";
import { env } from "./config/env.js";
import type { ServerStatus } from "./models/serverStatus.js";

async function bootstrap(): Promise<void> {
  const client = await createClientFromEnv();

  if (env.STATUS_MONITOR_ENABLED) {
    client.registerStatusCallback(
      (before: ServerStatus, after: ServerStatus) => {
        const changed = [...after.statuses.values()].filter(
          (status) => before.statuses.get(status.platform)?.status !== status.status
        );
        for (const status of changed) {
          console.log(`[status] ${status.platform}: ${status.status}`);
        }
      },
      {
        checkIntervalMs: env.STATUS_CHECK_INTERVAL_SECONDS * 1000,
        recheckIntervalMs: env.STATUS_RECHECK_INTERVAL_SECONDS * 1000
      }
    );
  }

  const app = createApp({ client, corsOrigin: env.CORS_ORIGIN });
  const server = app.listen(env.PORT, () => {
    console.log(`[server] game-stats-client listening on http://localhost:${env.PORT}`);
  });

  const shutdown = (): void => {
    server.close();
    closeResources(client).catch((error: unknown) => {
      console.error("[server] Failed to close the stats client:", error);
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

bootstrap().catch((error) => {
  console.error("Failed to start the game stats service:", error);
  process.exit(1);
});
