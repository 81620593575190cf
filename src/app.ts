import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import helmet from "helmet";
import { generalLimiter } from "./middleware/rateLimit";
import { createAccountRouter } from "./routes/route_account";
import { createMarketRouter } from "./routes/route_market";
import { marketQueue } from "./services/marketQueue";
import { SettlementService } from "./services/settlementService";
import { sendError, sendFailure } from "./utils/errors";

export interface AppOptions {
  allowedOrigins: string[];
  production?: boolean;
}

/**
 * Build the HTTP app around a settlement service. Nothing is started here;
 * the caller decides where (or whether) to listen.
 */
export function createApp(
  service: SettlementService,
  options: AppOptions
): express.Express {
  const app = express();

  app.set("trust proxy", 1);

  // ==========================================================================
  // Security Middleware
  // ==========================================================================
  app.use(helmet());
  app.use(
    cors({
      credentials: true,
      origin: (origin, callback) => {
        if (!origin || options.allowedOrigins.includes(origin)) {
          return callback(null, true);
        }
        if (!options.production) {
          console.warn(`[CORS] Allowing origin in development: ${origin}`);
          return callback(null, true);
        }
        console.warn(`[CORS] Blocked origin: ${origin}`);
        callback(new Error("Not allowed by CORS"));
      },
      methods: ["GET", "POST", "OPTIONS"],
      optionsSuccessStatus: 204,
    })
  );
  app.use(express.json({ limit: "100kb" }));

  // ==========================================================================
  // Routes
  // ==========================================================================
  app.get("/health", (req: Request, res: Response) => {
    res.status(200).send({
      status: "ok",
      timestamp: Date.now(),
      queues: marketQueue.getQueueStatus(),
    });
  });

  app.use("/api/v1", generalLimiter());
  app.use("/api/v1/market", createMarketRouter(service));
  app.use("/api/v1/account", createAccountRouter(service));

  app.use((req: Request, res: Response) => {
    sendError(res, 404, "Route not found");
  });

  // Malformed JSON bodies and anything a handler let through
  app.use(
    (error: unknown, req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        return next(error);
      }
      if (error instanceof SyntaxError) {
        return sendError(res, 400, "Malformed JSON body");
      }
      sendFailure(res, error, "HTTP");
    }
  );

  return app;
}
