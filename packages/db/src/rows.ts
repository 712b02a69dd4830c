// Narrow text columns back to the domain unions
// A value outside the union means the row was written by something other than this code: fail loudly

import {
    ContractVariantSchema,
    ExecutionStatusSchema,
    PositionStatusSchema,
    TradeRoleSchema,
    TradeSideSchema,
    type ContractVariant,
    type ExecutionStatus,
    type PositionStatus,
    type TradeRole,
    type TradeSide,
} from '@fillwatch/core';

export function parseSide(value: string): TradeSide {
    return TradeSideSchema.parse(value);
}

export function parseRole(value: string): TradeRole {
    return TradeRoleSchema.parse(value);
}

export function parseContractVariant(value: string): ContractVariant | 'unknown' {
    return ContractVariantSchema.parse(value);
}

export function parseStatus(value: string): ExecutionStatus {
    return ExecutionStatusSchema.parse(value);
}

export function parsePositionStatus(value: string): PositionStatus {
    return PositionStatusSchema.parse(value);
}
