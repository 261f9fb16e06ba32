import { createServer } from "node:http";
import { fileURLToPath } from "node:url";
import path from "node:path";
import { config as loadDotenv } from "dotenv";
import { build } from "esbuild";
import { FileTextStore, createSyncHub } from "../../text-sync/src/index.mjs";
import { loadConfig, serverUrl, websocketUrl } from "./config.mjs";
import type { ServerConfig } from "./config.mjs";
import { attachGateway, createRequestListener } from "./gateway.mjs";
import { createLogger } from "./logger.mjs";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const publicDir = path.join(__dirname, "..", "public");

loadDotenv();

let config: ServerConfig;
try {
  config = loadConfig();
} catch (error) {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
}

const logger = createLogger(config.logLevel);

await build({
  entryPoints: [path.join(__dirname, "client.mts")],
  bundle: true,
  format: "esm",
  outfile: path.join(publicDir, "client.js")
});
logger.debug("Editor bundle built");

const hub = await createSyncHub({
  store: new FileTextStore(config.textFile, { atomic: config.atomicWrites }),
  logger,
  maxContentBytes: config.maxContentBytes,
  sendTimeoutMs: config.sendTimeoutMs
});

const gatewayOptions = {
  hub,
  logger,
  publicDir,
  maxContentBytes: config.maxContentBytes
};
const server = createServer(createRequestListener(gatewayOptions));
const gateway = attachGateway(server, gatewayOptions);

server.listen(config.port, config.host, () => {
  logger.info(`Collaborative text editor running at ${serverUrl(config)}`);
  logger.info(`Editor: ${serverUrl(config)}/editor`);
  logger.info(`WebSocket endpoint: ${websocketUrl(config)}`);
  logger.info(`Persisting to ${hub.storeLocation}`);
});

function shutdown(signal: string) {
  logger.info(`Received ${signal}, shutting down...`);
  hub
    .close()
    .then(() => gateway.close())
    .then(
      () =>
        new Promise<void>((resolve, reject) => {
          server.close((error) => (error ? reject(error) : resolve()));
        })
    )
    .then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("Shutdown failed:", error instanceof Error ? error.message : error);
        process.exit(1);
      }
    );
}

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));
