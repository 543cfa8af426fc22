import { describeProject } from "@read-along/shared";

import { createReadAlongApp } from "./api/index.js";

async function main(): Promise<void> {
  const summary = describeProject();
  console.log(`${summary.name} backend starting...`, summary);

  const { app, config } = await createReadAlongApp();

  try {
    await app.listen({ port: config.port, host: config.host });
  } catch (error) {
    app.log.error({ err: error }, "Failed to start backend");
    process.exit(1);
  }

  const shutdown = async (signal: string) => {
    app.log.info(`Received ${signal}. Ending sessions and shutting down.`);
    await app.close();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

void main();
