#!/usr/bin/env node
import { GatewayBridge } from "./index";
import { loadBridgeOptions, loadSettings } from "./settings";

const DEFAULT_CONFIG_DIR = "./config";

async function main() {
  const configDir = process.env.GATEWAY_BRIDGE_CONFIG_DIR || DEFAULT_CONFIG_DIR;
  const settings = loadSettings(configDir);
  const bridge = new GatewayBridge({
    configDir,
    settings,
    options: loadBridgeOptions(),
  });

  bridge.events.on("connectionStateChanged", (snapshot) => {
    if (snapshot.state === "failed" && snapshot.lastError) {
      console.error(`[bridge] connection failed: ${snapshot.lastError}`);
    }
  });
  bridge.events.on("authRejected", (rejection) => {
    if (rejection.final) {
      console.error("[bridge] gateway rejected the stored credential; update gateway.json");
    }
  });
  bridge.events.on("secretUnavailable", (error) => {
    console.error(`[bridge] ${error.message}`);
  });
  bridge.events.on("queueOverflow", (sessionId) => {
    console.warn(`[bridge] dropped a queued message for ${sessionId}`);
  });
  bridge.events.on("sessionMessageCompleted", (sessionId, message) => {
    if (message.role === "assistant") {
      console.log(`[bridge] ${sessionId} reply complete (${message.contentSoFar.length} chars)`);
    }
  });

  bridge.start();
  if (!settings.auto_login) {
    bridge.connect();
  }

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log(`[bridge] received ${signal}, shutting down`);
    bridge
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error("[bridge] shutdown failed", error);
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error) => {
  console.error("[bridge] fatal", error);
  process.exit(1);
});
