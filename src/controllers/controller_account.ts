import { Response } from "express";
import { SettlementService } from "../services/settlementService";
import { sendFailure, sendSuccess } from "../utils/errors";
import { DepositRequest, UserRequest } from "../types/requests";

/**
 * Settlement balance handlers bound to one settlement service
 */
export const createAccountController = (service: SettlementService) => {
  /**
   * @route GET /api/v1/account/balance
   * @desc Balance the caller can stake from; payouts are credited here
   * @access Private
   */
  const getBalance = async (req: UserRequest, res: Response) => {
    try {
      const balance = await service.getBalance(req.id);
      sendSuccess(res, { account: req.id, balance: balance.toString() });
    } catch (error) {
      sendFailure(res, error, "Account");
    }
  };

  /**
   * @route POST /api/v1/account/:account/deposit
   * @desc Fund an account's settlement balance
   * @access Admin
   */
  const deposit = async (req: DepositRequest, res: Response) => {
    try {
      const balance = await service.deposit(
        req.id,
        req.params.account,
        req.body.amount
      );
      sendSuccess(res, {
        account: req.params.account,
        balance: balance.toString(),
      });
    } catch (error) {
      sendFailure(res, error, "Deposit");
    }
  };

  return { getBalance, deposit };
};
