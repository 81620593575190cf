import * as dotenv from "dotenv";
import path from "path";
import { SettlementStrategyKind } from "./engine/types";

dotenv.config({
  path: path.join(__dirname, "../.env"),
});

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string | undefined;
  password: string | undefined;
  database: string | undefined;
  ssl: boolean;
  sslRejectUnauthorized: boolean;
  poolMax: number;
}

export interface AppConfig {
  nodeEnv: string;
  port: number;
  clientUrl: string;
  jwtSecret: string | null;
  /** Access token lifetime in seconds */
  accessTokenTtl: number;
  adminAccounts: string[];
  enableWebSocket: boolean;
  defaultStrategy: SettlementStrategyKind;
  database: DatabaseConfig;
}

const parseList = (value: string | undefined): string[] =>
  (value || "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

const parseStrategy = (value: string | undefined): SettlementStrategyKind => {
  if (!value || value === "accrual") return "accrual";
  if (value === "bonding-curve") return value;
  throw new Error(`Invalid DEFAULT_STRATEGY: ${value}`);
};

/**
 * Read configuration from the environment.
 * Evaluated on every call so tests can adjust process.env between cases.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    nodeEnv: env.NODE_ENV || "development",
    port: parseInt(env.PORT || "5001", 10),
    clientUrl: env.CLIENT_URL || "http://localhost:5173",
    jwtSecret: env.JWT_SECRET || null,
    accessTokenTtl: parseInt(env.ACCESS_TOKEN_TTL || "900", 10),
    adminAccounts: parseList(env.ADMIN_ACCOUNTS),
    enableWebSocket: env.ENABLE_WEBSOCKET !== "false",
    defaultStrategy: parseStrategy(env.DEFAULT_STRATEGY),
    database: {
      host: env.DB_HOST || "localhost",
      port: parseInt(env.DB_PORT || "5432", 10),
      user: env.DB_USER,
      password: env.DB_PASSWORD,
      database: env.DB_NAME,
      ssl: env.DB_SSL === "true",
      sslRejectUnauthorized: env.DB_SSL_REJECT_UNAUTHORIZED !== "false",
      poolMax: parseInt(env.DB_POOL_MAX || "20", 10),
    },
  };
}

export function getRequiredJwtSecret(): string {
  const secret = getConfig().jwtSecret;
  if (!secret) {
    throw new Error("JWT_SECRET not available from environment");
  }
  return secret;
}
