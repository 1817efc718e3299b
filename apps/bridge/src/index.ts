import "dotenv/config";
import { buildBridgeApp } from "./app.js";
import { loadBridgeConfig, type BridgeConfig } from "./config/index.js";
import { createLogger, getErrorMessage } from "./logger.js";

function readConfig(): BridgeConfig {
  try {
    return loadBridgeConfig();
  } catch (error) {
    createLogger("error").error({ err: error }, `Invalid configuration: ${getErrorMessage(error)}`);
    process.exit(1);
  }
}

const config = readConfig();

const bridge = buildBridgeApp({ config });

let closing = false;
function shutdown(signal: NodeJS.Signals) {
  if (closing) {
    return;
  }
  closing = true;
  bridge.log.info({ signal }, "Shutting down");
  bridge
    .close()
    .then(() => {
      process.exit(0);
    })
    .catch((error: unknown) => {
      bridge.log.error({ err: error }, "Shutdown failed");
      process.exit(1);
    });
}

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);

bridge
  .start()
  .then(() => {
    bridge.log.info(
      `MQTT relay started (topic=${config.mqttTopic}, sink=${config.sinkUrl}, pid=${process.pid})`
    );
  })
  .catch((error: unknown) => {
    bridge.log.error({ err: error }, "MQTT relay failed to start");
    process.exit(1);
  });
