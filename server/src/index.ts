import { createApp } from "./app.js";
import { env } from "./config/env.js";
import { getProvider } from "./services/providers/index.js";

function main() {
  if (!getProvider(env.DATA_PROVIDER)) {
    console.error(`✗ Unknown DATA_PROVIDER "${env.DATA_PROVIDER}"`);
    process.exit(1);
  }

  const app = createApp();

  const server = app.listen(env.PORT, () => {
    console.log(`✓ Server running on port ${env.PORT}`);
    console.log(`  Environment: ${env.NODE_ENV}`);
    console.log(`  Data provider: ${env.DATA_PROVIDER}`);
    if (env.DATA_PROVIDER === "local") console.log(`  Data dir: ${env.DATA_DIR}`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`\n${signal} received. Shutting down gracefully...`);
    server.close(() => process.exit(0));
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main();
