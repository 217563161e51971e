/**
 * veil-relay
 *
 * Anonymous message relay with a moderator-gated pipeline.
 * A chat front-end calls this service; it stores, classifies, rate-limits
 * and routes messages without revealing who sent them.
 */

import { config as dotenvConfig } from "dotenv";
dotenvConfig();

import { createApp, SERVICE_NAME } from "./app.js";
import { loadConfig } from "./config.js";
import { createContext } from "./context.js";
import { openDatabase } from "./db/index.js";
import { LoggingTransport, WebhookTransport, type Transport } from "./services/transport.js";

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  const { db } = await openDatabase(config.databaseUrl);

  const transport: Transport = config.transportUrl
    ? new WebhookTransport(config.transportUrl, config.deliveryTimeoutMs)
    : new LoggingTransport();
  if (!config.transportUrl) {
    console.warn("TRANSPORT_URL not set; outbound messages are only logged");
  }

  const app = createApp(createContext(db, config, transport));
  app.listen(config.port, () => {
    console.log(`${SERVICE_NAME} listening on port ${config.port}`);
  });
}

main().catch((err: unknown) => {
  console.error("Startup failed:", err);
  process.exit(1);
});
