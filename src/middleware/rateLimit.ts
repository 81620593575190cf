import { Request, Response } from "express";
import rateLimit from "express-rate-limit";

/**
 * Rate limiting middleware using express-rate-limit with its in-memory
 * store. Each call builds a fresh limiter, so every app instance counts
 * on its own.
 */

const getClientIP = (req: Request): string =>
  req.ip || req.socket.remoteAddress || "unknown";

const createLimiter = (windowMs: number, limit: number, message: string) => {
  return rateLimit({
    windowMs,
    limit,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req: Request) => getClientIP(req),
    handler: (req: Request, res: Response) => {
      console.warn(`[Rate Limit] ${message} from IP: ${getClientIP(req)}`);
      res.status(429).json({
        error: "Too Many Requests",
        message,
      });
    },
  });
};

/**
 * General rate limiter - applied to all API routes
 */
export const generalLimiter = () =>
  createLimiter(
    60 * 1000,
    120,
    "Too many requests from this IP, please try again after 1 minute"
  );

export const stakeLimiter = () =>
  createLimiter(
    60 * 1000,
    30,
    "Stake rate limit exceeded, please wait before staking again"
  );

/**
 * Claims and expired withdrawals
 */
export const payoutLimiter = () =>
  createLimiter(
    60 * 1000,
    10,
    "Payout rate limit exceeded, please wait before trying again"
  );

export const marketCreationLimiter = () =>
  createLimiter(
    60 * 60 * 1000,
    10,
    "Market creation rate limit exceeded, please try again later"
  );
