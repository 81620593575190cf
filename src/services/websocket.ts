import { Server as HttpServer } from "http";
import { Server, Socket } from "socket.io";
import { MarketEvent } from "../engine/types";
import { verifyAccessToken } from "../utils/jwt";
import { serializeEvent } from "../utils/serialize";

interface AuthenticatedSocket extends Socket {
  account?: string;
}

let io: Server | null = null;

/**
 * Initialize WebSocket server
 */
export const initializeWebSocket = (
  server: HttpServer,
  origins: string[]
): Server => {
  io = new Server(server, {
    cors: {
      origin: origins,
      methods: ["GET", "POST"],
      credentials: true,
    },
    transports: ["websocket", "polling"],
  });

  io.on("connection", (socket: AuthenticatedSocket) => {
    console.log(`[WebSocket] Client connected: ${socket.id}`);

    const auth: unknown = socket.handshake.auth;
    const token =
      (typeof auth === "object" &&
      auth !== null &&
      "token" in auth &&
      typeof auth.token === "string"
        ? auth.token
        : undefined) || socket.handshake.headers?.authorization?.split(" ")[1];

    if (token) {
      try {
        const payload = verifyAccessToken(token);
        socket.account = payload.id;
        console.log(
          `[WebSocket] Client ${socket.id} authenticated as ${payload.id}`
        );
      } catch (error) {
        console.warn(
          `[WebSocket] Client ${socket.id} authentication failed:`,
          error
        );
      }
    }

    socket.on("subscribe:market", (marketId: string, ack?: () => void) => {
      void socket.join(`market:${marketId}`);
      console.log(`[WebSocket] ${socket.id} subscribed to market:${marketId}`);
      ack?.();
    });

    socket.on("unsubscribe:market", (marketId: string) => {
      void socket.leave(`market:${marketId}`);
      console.log(
        `[WebSocket] ${socket.id} unsubscribed from market:${marketId}`
      );
    });

    // Payout notifications for the authenticated account only
    socket.on("subscribe:account", (ack?: (ok: boolean) => void) => {
      if (!socket.account) {
        socket.emit("subscribe:error", { message: "Authentication required" });
        ack?.(false);
        return;
      }
      void socket.join(`account:${socket.account}`);
      ack?.(true);
    });

    socket.on("disconnect", () => {
      console.log(`[WebSocket] Client disconnected: ${socket.id}`);
    });
  });

  return io;
};

/**
 * Broadcast a settlement event to the market room, and payouts to the
 * receiving account's room as well
 */
export const emitMarketEvent = (event: MarketEvent): void => {
  if (!io) return;

  const payload = serializeEvent(event);
  io.to(`market:${event.market_id}`).emit(event.type, payload);

  if (event.type === "claim" || event.type === "expired-withdrawal") {
    io.to(`account:${event.account}`).emit("payout", payload);
  }
};

export const closeWebSocket = async (): Promise<void> => {
  if (io) {
    await new Promise<void>((resolve) => io?.close(() => resolve()));
    io = null;
  }
};
