import jwt from "jsonwebtoken";
import { getConfig, getRequiredJwtSecret } from "../config";

export interface JwtPayload {
  id: string;
}

/**
 * Generate access token for an account
 */
export const generateAccessToken = (payload: JwtPayload): string => {
  return jwt.sign({ id: payload.id }, getRequiredJwtSecret(), {
    expiresIn: getConfig().accessTokenTtl,
  });
};

/**
 * Verify access token
 */
export const verifyAccessToken = (token: string): JwtPayload => {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, getRequiredJwtSecret());
  } catch (error) {
    throw new Error("Invalid or expired access token");
  }
  if (typeof decoded === "string" || typeof decoded.id !== "string") {
    throw new Error("Invalid or expired access token");
  }
  return { id: decoded.id };
};
