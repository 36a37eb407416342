import dotenv from "dotenv";

import { buildAppContext } from "./runtime/serviceRegistry.js";
import { createServer } from "./server.js";
import { describeError } from "./telemetry/logger.js";

async function main() {
  dotenv.config();

  const context = await buildAppContext();
  const { host, port } = context.config;
  const app = createServer(context);

  const server = app.listen(port, host, () => {
    context.logger.info(`${context.config.service.title} listening on http://${host}:${port}`, {
      youtubeApiKeySource: context.youtubeApiKey.source,
    });
  });
  server.on("error", (error) => {
    context.logger.error("Server failed to start", { error: describeError(error) });
    process.exitCode = 1;
  });
}

main().catch((error) => {
  console.error("[server] fatal error:", error);
  process.exitCode = 1;
});
