import { isIP } from "node:net";
import { serve } from "@hono/node-server";
import { getLogger } from "@logtape/logtape";
import { createApi } from "../src/api";
import {
  createElasticsearchClient,
  ElasticsearchTransport,
} from "../src/backend/elasticsearch";
import { SearchSession } from "../src/backend/session";
import { type Config, loadConfig } from "../src/config";
import { configureLogging } from "../src/logging";

let config: Config;
try {
  config = loadConfig();
} catch (error) {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
}

if (config.bind && config.bind !== "localhost" && !isIP(config.bind)) {
  console.error(
    "Invalid BIND: must be an IP address or localhost, if specified",
  );
  process.exit(1);
}

await configureLogging(config.logLevel);
const logger = getLogger(["papersearch", "server"]);

const client = createElasticsearchClient(config.elasticsearch);
const transport = new ElasticsearchTransport(
  client,
  config.elasticsearch.index,
);
const session = new SearchSession(transport, {
  mapping: config.elasticsearch.mapping,
});
const app = createApi(session);

const server = serve(
  {
    fetch: app.fetch.bind(app),
    port: config.port,
    hostname: config.bind,
  },
  (info) => {
    let host = info.address;
    // We override it here to show localhost instead of what it resolves to:
    if (config.bind === "localhost") {
      host = "localhost";
    } else if (info.family === "IPv6") {
      host = `[${info.address}]`;
    }

    logger.info("Listening on http://{host}:{port}/", {
      host,
      port: info.port,
    });
  },
);

// Graceful shutdown handling
const shutdown = () => {
  logger.info("Shutting down...");
  server.close();
  client.close().then(
    () => process.exit(0),
    (error: unknown) => {
      logger.error("Failed to close the index client: {error}", { error });
      process.exit(1);
    },
  );
};

process.on("SIGTERM", shutdown);
process.on("SIGINT", shutdown);
