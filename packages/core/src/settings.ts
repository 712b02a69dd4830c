// Ledger settings - settlement thresholds applied by the position reducer

import { LedgerSettingsSchema } from './validation.js';

// ============================================================================
// Types
// ============================================================================

export interface LedgerSettings {
    /** A sell at or above this price is treated as a winning settlement */
    settlementWinThreshold: number;
    /** A sell at or below this price is treated as a losing settlement */
    settlementLossThreshold: number;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_LEDGER_SETTINGS: LedgerSettings = {
    settlementWinThreshold: 0.95,
    settlementLossThreshold: 0.05,
};

// Terminal prices a binary market resolves to
export const SETTLEMENT_WIN_PRICE = '1';
export const SETTLEMENT_LOSS_PRICE = '0';

// ============================================================================
// Build Settings
// ============================================================================

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws a ZodError when the thresholds are out of range or overlap.
 */
export function buildLedgerSettings(overrides: Partial<LedgerSettings> = {}): LedgerSettings {
    return LedgerSettingsSchema.parse({ ...DEFAULT_LEDGER_SETTINGS, ...overrides });
}
