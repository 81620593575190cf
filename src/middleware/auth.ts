import { Request, Response, NextFunction } from "express";
import { verifyAccessToken } from "../utils/jwt";

/**
 * Middleware to authenticate JWT tokens
 * Expects token in Authorization header as "Bearer <token>"
 */
export const authenticateToken = (
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  const authHeader = req.headers["authorization"];
  const token = authHeader && authHeader.split(" ")[1];

  if (!token) {
    res.status(401).send({
      error: "Access token required",
      message: "Please provide a valid access token",
    });
    return;
  }

  try {
    req.id = verifyAccessToken(token).id;
  } catch (error) {
    res.status(401).send({
      error: "Invalid token",
      message:
        error instanceof Error ? error.message : "Token verification failed",
    });
    return;
  }
  next();
};
