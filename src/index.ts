// ============================================================================
// Environment Configuration
// ============================================================================
import { getConfig } from "./config";

// ============================================================================
// External Dependencies
// ============================================================================
import { createServer } from "http";

// ============================================================================
// Internal Services
// ============================================================================
import { createApp } from "./app";
import { closePool, initializePool } from "./db";
import { systemClock } from "./services/clock";
import { marketQueue } from "./services/marketQueue";
import { PgMarketStore } from "./services/marketStore";
import { SettlementService } from "./services/settlementService";
import {
  closeWebSocket,
  emitMarketEvent,
  initializeWebSocket,
} from "./services/websocket";

const config = getConfig();
const allowedOrigins = [config.clientUrl];

initializePool();
console.log("✅ Database pool initialized successfully");

const service = new SettlementService({
  store: new PgMarketStore(),
  clock: systemClock,
  adminAccounts: config.adminAccounts,
  defaultStrategy: config.defaultStrategy,
  onEvent: emitMarketEvent,
});

const app = createApp(service, {
  allowedOrigins,
  production: config.nodeEnv === "production",
});
const server = createServer(app);

if (config.enableWebSocket) {
  initializeWebSocket(server, allowedOrigins);
  console.log("✅ WebSocket server initialized");
}

server.listen(config.port, () => {
  console.log(`🚀 Settlement server listening on port ${config.port}`);
});

// ============================================================================
// Graceful Shutdown
// ============================================================================
const shutdown = async (signal: string): Promise<void> => {
  console.log(`[Server] ${signal} received, shutting down`);
  marketQueue.clear();
  await closeWebSocket();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  await closePool();
  process.exit(0);
};

for (const signal of ["SIGINT", "SIGTERM"]) {
  process.once(signal, () => {
    shutdown(signal).catch((error) => {
      console.error("[Server] Shutdown failed:", error);
      process.exit(1);
    });
  });
}
