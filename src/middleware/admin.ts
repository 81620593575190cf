import { Request, Response, NextFunction } from "express";

/**
 * Middleware to require admin privileges
 * Must be used after authenticateToken middleware
 */
export const requireAdmin = (isAdmin: (account: string) => boolean) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!req.id) {
      res.status(401).send({ error: "Authentication required" });
      return;
    }

    if (!isAdmin(req.id)) {
      res.status(403).send({ error: "Admin access required" });
      return;
    }

    next();
  };
};
