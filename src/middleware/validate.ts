import { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { parseEther } from "../utils/amounts";
import { FieldError, sendError } from "../utils/errors";

const formatIssues = (error: z.ZodError): FieldError[] =>
  error.issues.map((issue) => ({
    field: issue.path.join("."),
    message: issue.message,
  }));

/**
 * Validation middleware factory
 * Replaces the request body with the parsed (and transformed) value
 */
export const validateBody = <T extends z.ZodTypeAny>(schema: T) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      sendError(res, 400, "Validation failed", formatIssues(result.error));
      return;
    }
    req.body = result.data;
    next();
  };
};

/**
 * Validates query parameters; handlers keep reading the raw strings
 */
export const validateQuery = <T extends z.ZodTypeAny>(schema: T) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.query);
    if (!result.success) {
      sendError(
        res,
        400,
        "Invalid query parameters",
        formatIssues(result.error)
      );
      return;
    }
    next();
  };
};

// =====================================================
// Market schemas
// =====================================================

const MAX_NAME_LENGTH = 200;

const unixSeconds = z.number().int().nonnegative();

const outcomeSchema = z.enum(["yes", "no"]);

const etherString = z
  .string()
  .refine((value) => parseEther(value) !== null, {
    message: "Amount must be a decimal string with at most 18 decimals",
  });

/** Ether decimal string in, wei out */
const etherAmount = etherString.transform((value, ctx) => {
  const wei = parseEther(value);
  if (wei === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Invalid amount" });
    return z.NEVER;
  }
  return wei;
});

export const createMarketSchema = z.object({
  name: z.string().trim().min(1).max(MAX_NAME_LENGTH),
  start_time: unixSeconds,
  end_time: unixSeconds,
  expiry_time: unixSeconds,
  strategy: z.enum(["accrual", "bonding-curve"]).optional(),
});

export const stakeSchema = z.object({
  outcome: outcomeSchema,
  amount: etherAmount,
});

export const resolveSchema = z.object({
  outcome: outcomeSchema,
});

export const quoteQuerySchema = z.object({
  outcome: outcomeSchema,
  amount: etherString,
});

// =====================================================
// Account schemas
// =====================================================

export const depositSchema = z.object({
  amount: etherAmount,
});

export const listQuerySchema = z.object({
  limit: z
    .string()
    .regex(/^\d+$/, "limit must be a positive integer")
    .optional(),
});

export type CreateMarketBody = z.infer<typeof createMarketSchema>;
export type StakeBody = z.infer<typeof stakeSchema>;
export type ResolveBody = z.infer<typeof resolveSchema>;
export type DepositBody = z.infer<typeof depositSchema>;
