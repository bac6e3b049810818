import { env } from "./config/env";
import { createApp, createDefaultDependencies } from "./app";

const SESSION_SWEEP_INTERVAL_MS = 60 * 1000;

async function bootstrap() {
  const deps = createDefaultDependencies();
  deps.store.startSweeper(SESSION_SWEEP_INTERVAL_MS);
  const app = createApp(deps);
  app.listen(env.PORT, () => {
    console.log(`Backend listening on http://localhost:${env.PORT}`);
  });
}

bootstrap().catch((error) => {
  console.error("Failed to start backend:", error);
  process.exit(1);
});
