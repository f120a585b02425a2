/**
 * Validation Middleware and Schemas
 * Zod schemas for all API inputs
 */

import { z } from 'zod';
import { getAddress, parseGwei, parseUnits } from 'viem';
import type { Request, Response, NextFunction } from 'express';
import type { Address } from '../../../shared/schema.js';

// Common validation patterns
const addressPattern = /^0x[a-fA-F0-9]{40}$/;
const uint256Pattern = /^\d+$/;
const decimalPattern = /^\d+(\.\d{1,18})?$/;

// Ethereum address schema, checksummed
export const addressSchema = z
  .string()
  .regex(addressPattern, 'Invalid Ethereum address')
  .transform((value): Address => getAddress(value));

// Token amount in base units
export const amountSchema = z
  .string()
  .regex(uint256Pattern, 'Amount must be an integer string')
  .transform((value) => BigInt(value))
  .refine((value) => value > 0n, 'Amount must be positive');

// Reference-unit value given as a decimal USD string
export const usdSchema = z
  .string()
  .regex(decimalPattern, 'Invalid USD value')
  .transform((value) => parseUnits(value, 18));

export const gweiSchema = z
  .string()
  .regex(/^\d+(\.\d{1,9})?$/, 'Invalid gwei value')
  .transform((value) => parseGwei(value));

export const strategySchema = z.enum(['direct', 'flashloan']);

export const triggerSchema = z.object({
  amount: amountSchema,
});

export const scheduleSchema = z.object({
  strategy: strategySchema,
  amount: amountSchema,
  intervalMs: z.number().int().positive().max(3_600_000).optional(),
});

export const thresholdsSchema = z.object({
  gasPriceLimitGwei: gweiSchema,
  profitThresholdUsd: usdSchema,
  superProfitThresholdUsd: usdSchema,
  liquidityThresholdUsd: usdSchema,
});

export const addTokenSchema = z.object({
  address: addressSchema,
});

export const historyQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(500).default(50),
});

// Common param schemas
export const addressParamSchema = z.object({
  address: addressSchema,
});

// Type exports
export type TriggerInput = z.infer<typeof triggerSchema>;
export type ScheduleInput = z.infer<typeof scheduleSchema>;
export type ThresholdsInput = z.infer<typeof thresholdsSchema>;
export type AddTokenInput = z.infer<typeof addTokenSchema>;
export type HistoryQuery = z.infer<typeof historyQuerySchema>;

/**
 * Validation middleware factory
 * Validates request body against a Zod schema
 */
export function validateBody<T extends z.ZodType>(schema: T) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      return res.status(400).json({
        success: false,
        error: 'Validation failed',
        details: result.error.flatten().fieldErrors,
        timestamp: Date.now(),
      });
    }

    next();
  };
}

/**
 * Validation middleware for route params
 */
export function validateParams<T extends z.ZodType>(schema: T) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.params);

    if (!result.success) {
      return res.status(400).json({
        success: false,
        error: 'Invalid route parameters',
        details: result.error.flatten().fieldErrors,
        timestamp: Date.now(),
      });
    }

    next();
  };
}

/**
 * Typed view of input that passed the middleware above
 */
export function parseInput<T extends z.ZodType>(schema: T, input: unknown): z.output<T> {
  return schema.parse(input);
}
