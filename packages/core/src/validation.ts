// Validation schemas using zod
// Used to validate configuration, settings and rows read back from the database

import { z } from 'zod';

export const TradeSideSchema = z.enum(['buy', 'sell', 'unknown']);

export const TradeRoleSchema = z.enum(['maker', 'taker']);

export const PositionStatusSchema = z.enum(['active', 'closed', 'settled_win', 'settled_loss']);

// Lower-case 0x address
export const AddressSchema = z
    .string()
    .regex(/^0x[0-9a-fA-F]{40}$/, 'Expected a 20-byte hex address')
    .transform(value => value.toLowerCase());

export const LedgerSettingsSchema = z
    .object({
        settlementWinThreshold: z.number().gt(0).lte(1),
        settlementLossThreshold: z.number().gte(0).lt(1),
    })
    .refine(s => s.settlementLossThreshold < s.settlementWinThreshold, {
        message: 'settlementLossThreshold must be below settlementWinThreshold',
    });

export const ContractVariantSchema = z.enum(['ctf', 'neg_risk', 'unknown']);

export const ExecutionStatusSchema = z.enum(['success', 'failed']);
