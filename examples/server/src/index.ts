/**
 * seqchat example server.
 * Demonstrates: createServer, env configuration, JWT auth and a seeded in-memory store.
 *
 *   SEQCHAT_JWT_SECRET=dev-secret PORT=3000 npm start
 */

import {
  createJwtCredentialValidator,
  createLogger,
  createInMemoryChatStore,
  createServer,
  loadConfigFromEnv,
  normalizeError,
} from "@seqchat/server";

const config = loadConfigFromEnv();
const logger = createLogger({ level: config.logLevel, serviceName: "seqchat-example" });

// Without a secret, tokens are decoded but not verified. Development only.
if (!config.jwtSecret) {
  logger.warn("SEQCHAT_JWT_SECRET is not set; accepting unverified tokens");
}
const validateCredential = createJwtCredentialValidator(
  config.jwtSecret ? { secret: config.jwtSecret } : { decodeOnly: true }
);

const store = createInMemoryChatStore({
  chats: [
    { id: "general", kind: "group", name: "General", participants: [{ userId: "alice", role: "owner" }, { userId: "bob" }, { userId: "carol" }] },
    { id: "alice-bob", kind: "direct", participants: [{ userId: "alice" }, { userId: "bob" }] },
  ],
});

const server = createServer({
  port: config.port,
  store,
  logger,
  validateCredential,
  config: config.core,
});

server.on("listening", () => {
  logger.info({ port: config.port, path: config.core.path }, "seqchat example server listening");
});

function shutdown(signal: string): void {
  logger.info({ signal }, "shutting down");
  server.core
    .close()
    .then(() => {
      server.close();
    })
    .catch((err: unknown) => {
      logger.error({ error: normalizeError(err) }, "shutdown failed");
      process.exitCode = 1;
      server.close();
    });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
