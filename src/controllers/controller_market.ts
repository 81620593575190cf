import { Response } from "express";
import { SettlementService } from "../services/settlementService";
import { parseEther } from "../utils/amounts";
import { sendFailure, sendSuccess, sendValidationError } from "../utils/errors";
import {
  serializeHeader,
  serializeMarket,
  serializePositions,
} from "../utils/serialize";
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

const DEFAULT_LIST_LIMIT = 50;
const MAX_LIST_LIMIT = 200;

/**
 * Market handlers bound to one settlement service
 */
export const createMarketController = (service: SettlementService) => {
  /**
   * @route GET /api/v1/market
   * @desc List markets, newest first
   * @access Public
   */
  const getMarkets = async (req: GetMarketsRequest, res: Response) => {
    try {
      const limit = Math.min(
        parseInt(req.query.limit || String(DEFAULT_LIST_LIMIT), 10),
        MAX_LIST_LIMIT
      );
      const headers = await service.listMarkets(limit);
      sendSuccess(res, { markets: headers.map(serializeHeader) });
    } catch (error) {
      sendFailure(res, error, "Market");
    }
  };

  /**
   * @route POST /api/v1/market
   * @desc Create a market; the caller becomes its resolution authority
   * @access Admin
   */
  const createMarket = async (req: CreateMarketRequest, res: Response) => {
    try {
      const view = await service.createMarket(req.id, req.body);
      sendSuccess(
        res,
        { market: serializeMarket(view.header, view.pools, view.state) },
        201
      );
    } catch (error) {
      sendFailure(res, error, "Market");
    }
  };

  /**
   * @route GET /api/v1/market/:id
   * @access Public
   */
  const getMarket = async (req: GetMarketRequest, res: Response) => {
    try {
      const view = await service.getMarket(req.params.id);
      sendSuccess(res, {
        market: serializeMarket(view.header, view.pools, view.state),
      });
    } catch (error) {
      sendFailure(res, error, "Market");
    }
  };

  /**
   * @route GET /api/v1/market/:id/position/:account
   * @access Public
   */
  const getPosition = async (req: GetPositionRequest, res: Response) => {
    try {
      const view = await service.getPosition(
        req.params.id,
        req.params.account
      );
      sendSuccess(res, {
        account: view.account,
        positions: serializePositions(view.positions),
        earned: {
          yes: view.earned.yes.toString(),
          no: view.earned.no.toString(),
        },
      });
    } catch (error) {
      sendFailure(res, error, "Market");
    }
  };

  /**
   * @route GET /api/v1/market/:id/quote?outcome=yes&amount=1.5
   * @desc Shares a stake would buy on a bonding-curve market
   * @access Public
   */
  const getQuote = async (req: QuoteRequest, res: Response) => {
    try {
      const amount = parseEther(req.query.amount);
      if (amount === null) {
        return sendValidationError(res, "Invalid amount", "amount");
      }
      const shares = await service.quote(
        req.params.id,
        req.query.outcome,
        amount
      );
      sendSuccess(res, {
        outcome: req.query.outcome,
        amount: amount.toString(),
        shares: shares.toString(),
      });
    } catch (error) {
      sendFailure(res, error, "Market");
    }
  };

  /**
   * @route POST /api/v1/market/:id/stake
   * @access Private
   */
  const stake = async (req: StakeRequest, res: Response) => {
    try {
      const { outcome, amount } = req.body;
      const receipt = await service.stake(req.params.id, req.id, outcome, amount);
      sendSuccess(res, {
        outcome,
        amount: receipt.amount.toString(),
        shares: receipt.shares.toString(),
      });
    } catch (error) {
      sendFailure(res, error, "Stake");
    }
  };

  /**
   * @route POST /api/v1/market/:id/resolve
   * @access Private (market authority)
   */
  const resolve = async (req: ResolveMarketRequest, res: Response) => {
    try {
      await service.resolve(req.params.id, req.id, req.body.outcome);
      sendSuccess(res, { resolution: req.body.outcome });
    } catch (error) {
      sendFailure(res, error, "Resolve");
    }
  };

  /**
   * @route POST /api/v1/market/:id/claim
   * @access Private
   */
  const claim = async (req: MarketActionRequest, res: Response) => {
    try {
      const payout = await service.claim(req.params.id, req.id);
      sendSuccess(res, { amount: payout.toString() });
    } catch (error) {
      sendFailure(res, error, "Claim");
    }
  };

  /**
   * @route POST /api/v1/market/:id/withdraw-expired
   * @access Private
   */
  const withdrawExpired = async (req: MarketActionRequest, res: Response) => {
    try {
      const amount = await service.withdrawExpired(req.params.id, req.id);
      sendSuccess(res, { amount: amount.toString() });
    } catch (error) {
      sendFailure(res, error, "Withdraw");
    }
  };

  return {
    getMarkets,
    createMarket,
    getMarket,
    getPosition,
    getQuote,
    stake,
    resolve,
    claim,
    withdrawExpired,
  };
};
