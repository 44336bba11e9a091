#!/usr/bin/env node
import { PowerBIClient } from "./core/client.js";
import { createServerConfig } from "./core/config.js";
import { describeError } from "./core/errors.js";
import { logError, logInfo } from "./core/utils.js";
import { createMcpApp } from "./mcp/server.js";

function main(): void {
  const config = createServerConfig();
  const client = PowerBIClient.fromEnv();
  const app = createMcpApp(client, config);

  app.listen(config.port, config.host, () => {
    logInfo("server.started", {
      host: config.host,
      port: config.port,
      mcpPath: config.mcpPath,
      healthPath: config.healthPath,
      serverKeyRequired: config.serverApiKey !== "",
      credential: client.tokens.credentialKind,
      baseUrl: client.config.baseUrl,
    });
  });
}

try {
  main();
} catch (error) {
  const mapped = describeError(error);
  logError("server.startFailed", { status: mapped.status, error: mapped.message });
  process.exitCode = 1;
}
