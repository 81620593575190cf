import { Router } from "express";
import { createAccountController } from "../controllers/controller_account";
import { requireAdmin } from "../middleware/admin";
import { authenticateToken } from "../middleware/auth";
import { depositSchema, validateBody } from "../middleware/validate";
import { SettlementService } from "../services/settlementService";
import { typedHandler } from "../types/routeHandler";
import { DepositRequest, UserRequest } from "../types/requests";

export const createAccountRouter = (service: SettlementService): Router => {
  const router = Router();
  const controller = createAccountController(service);

  router.get(
    "/balance",
    authenticateToken,
    typedHandler<UserRequest>(controller.getBalance)
  );

  // Admin routes
  router.post(
    "/:account/deposit",
    authenticateToken,
    requireAdmin((account) => service.isAdmin(account)),
    validateBody(depositSchema),
    typedHandler<DepositRequest>(controller.deposit)
  );

  return router;
};
