import { closeResources, createClientFromEnv, createSnapshotStore, resolveLanguage } from "../config/client.js";
import { env } from "../config/env.js";
import { warmLanguages } from "../services/cacheWarmer.js";

async function main(): Promise<void> {
  const languages = env.WARM_LANGUAGES.map(resolveLanguage);
  const snapshotStore = await createSnapshotStore();
  const client = await createClientFromEnv(snapshotStore);

  try {
    const { warmed, failed } = await warmLanguages(client, languages, snapshotStore);
    console.log(`[warm-cache] warmed ${warmed.length}/${languages.length} languages`);
    if (failed.length > 0) process.exitCode = 1;
  } finally {
    await closeResources(client);
  }
}

main().catch((error) => {
  console.error("[warm-cache] failed:", error);
  process.exit(1);
});
