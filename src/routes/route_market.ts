import { Router } from "express";
import { createMarketController } from "../controllers/controller_market";
import { requireAdmin } from "../middleware/admin";
import { authenticateToken } from "../middleware/auth";
import {
  marketCreationLimiter,
  payoutLimiter,
  stakeLimiter,
} from "../middleware/rateLimit";
import {
  createMarketSchema,
  listQuerySchema,
  quoteQuerySchema,
  resolveSchema,
  stakeSchema,
  validateBody,
  validateQuery,
} from "../middleware/validate";
import { SettlementService } from "../services/settlementService";
import { typedHandler } from "../types/routeHandler";
import {
  CreateMarketRequest,
  GetMarketRequest,
  GetMarketsRequest,
  GetPositionRequest,
  MarketActionRequest,
  QuoteRequest,
  ResolveMarketRequest,
  StakeRequest,
} from "../types/requests";

export const createMarketRouter = (service: SettlementService): Router => {
  const router = Router();
  const controller = createMarketController(service);

  // Public routes
  router.get(
    "/",
    validateQuery(listQuerySchema),
    typedHandler<GetMarketsRequest>(controller.getMarkets)
  );
  router.get("/:id", typedHandler<GetMarketRequest>(controller.getMarket));
  router.get(
    "/:id/position/:account",
    typedHandler<GetPositionRequest>(controller.getPosition)
  );
  router.get(
    "/:id/quote",
    validateQuery(quoteQuerySchema),
    typedHandler<QuoteRequest>(controller.getQuote)
  );

  // Protected routes
  router.post(
    "/",
    authenticateToken,
    requireAdmin((account) => service.isAdmin(account)),
    marketCreationLimiter(),
    validateBody(createMarketSchema),
    typedHandler<CreateMarketRequest>(controller.createMarket)
  );
  router.post(
    "/:id/stake",
    authenticateToken,
    stakeLimiter(),
    validateBody(stakeSchema),
    typedHandler<StakeRequest>(controller.stake)
  );
  router.post(
    "/:id/resolve",
    authenticateToken,
    validateBody(resolveSchema),
    typedHandler<ResolveMarketRequest>(controller.resolve)
  );
  router.post(
    "/:id/claim",
    authenticateToken,
    payoutLimiter(),
    typedHandler<MarketActionRequest>(controller.claim)
  );
  router.post(
    "/:id/withdraw-expired",
    authenticateToken,
    payoutLimiter(),
    typedHandler<MarketActionRequest>(controller.withdrawExpired)
  );

  return router;
};
