import { Request } from "express";
import type {
  CreateMarketBody,
  DepositBody,
  ResolveBody,
  StakeBody,
} from "../middleware/validate";

declare global {
  namespace Express {
    interface Request {
      /** Account id, set by authenticateToken */
      id?: string;
    }
  }
}

/**
 * Base UserRequest interface that extends Express Request
 * Used for authenticated routes
 */
export interface UserRequest extends Request {
  id: string;
}

/**
 * Typed request interfaces for Market Controller
 */
export interface GetMarketsRequest extends Request {
  query: {
    limit?: string;
  };
}

export interface GetMarketRequest extends Request {
  params: {
    id: string;
  };
}

export interface GetPositionRequest extends Request {
  params: {
    id: string;
    account: string;
  };
}

export interface QuoteRequest extends Request {
  params: {
    id: string;
  };
  query: {
    outcome: "yes" | "no";
    amount: string;
  };
}

export interface CreateMarketRequest extends UserRequest {
  body: CreateMarketBody;
}

export interface StakeRequest extends UserRequest {
  params: {
    id: string;
  };
  body: StakeBody;
}

export interface ResolveMarketRequest extends UserRequest {
  params: {
    id: string;
  };
  body: ResolveBody;
}

export interface MarketActionRequest extends UserRequest {
  params: {
    id: string;
  };
}

/**
 * Typed request interfaces for Account Controller
 */
export interface DepositRequest extends UserRequest {
  params: {
    account: string;
  };
  body: DepositBody;
}
