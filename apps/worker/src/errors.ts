/**
 * Error taxonomy for the ingestion worker
 *
 * - TransientRpcError: retried by the endpoint pool, then rotated away from
 * - RangeExceededError: the scanner re-plans the window with the corrected bound
 * - EndpointsExhaustedError: every endpoint is cooling down
 * - DecodeError: stays inside the decoder, which turns it into an unknown-side fill
 * - FatalLoopError: the monitor gives up after too many consecutive failures
 */

import { ethers } from 'ethers';

export type ErrorContext = Record<string, unknown>;

export class FillwatchError extends Error {
    readonly context: ErrorContext;

    constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.context = context;
    }
}

export type TransientReason = 'timeout' | 'rate_limit' | 'malformed' | 'network' | 'unknown';

export class TransientRpcError extends FillwatchError {
    constructor(
        message: string,
        readonly reason: TransientReason,
        context: ErrorContext = {},
        options?: { cause?: unknown },
    ) {
        super(message, { ...context, reason }, options);
    }
}

export class RangeExceededError extends FillwatchError {
    /**
     * @param maxBlockRange largest span (in blocks, inclusive) the endpoint accepts,
     * or null when the provider did not say
     */
    constructor(
        message: string,
        readonly maxBlockRange: number | null,
        context: ErrorContext = {},
        options?: { cause?: unknown },
    ) {
        super(message, { ...context, maxBlockRange }, options);
    }
}

export class EndpointsExhaustedError extends FillwatchError { }

export class DecodeError extends FillwatchError { }

export class FatalLoopError extends FillwatchError {
    constructor(readonly consecutiveErrors: number, lastError: unknown) {
        super(
            `Giving up after ${consecutiveErrors} consecutive failures`,
            { consecutiveErrors, lastError: errorMessage(lastError) },
            { cause: lastError },
        );
    }
}

// ============================================================================
// Helpers
// ============================================================================

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Log-friendly form of an error: pino only serializes Error under the `err` key
 */
export function serializeError(error: unknown): Record<string, unknown> {
    if (error instanceof FillwatchError) {
        return { name: error.name, message: error.message, ...error.context };
    }
    if (error instanceof Error) {
        return { name: error.name, message: error.message };
    }
    return { message: String(error) };
}

// ============================================================================
// Provider error classification
// ============================================================================

const RANGE_PATTERNS = [
    /block range/i,
    /range (is )?too (large|wide|big)/i,
    /exceed(s|ed)? (the )?(max(imum)?|limit).*range/i,
    /query returned more than \d+ results/i,
    /log response size exceeded/i,
    /too many blocks/i,
];

// "up to a 2K block range", "block range limit (100)", "max block range: 50", "limited to 1,000 blocks"
const RANGE_BOUND_PATTERNS = [
    /up to an? ([\d,]+)\s*(k)?\s*block range/i,
    /block range (?:limit|of|is)?\s*\(?([\d,]+)\s*(k)?\)?/i,
    /max(?:imum)? block range:?\s*([\d,]+)\s*(k)?/i,
    /limited to (?:an? )?([\d,]+)\s*(k)?\s*blocks?/i,
];

const RATE_LIMIT_PATTERN = /rate limit|too many requests|\b429\b|exceeded .*capacity|daily request count/i;
const TIMEOUT_PATTERN = /timeout|timed out|ETIMEDOUT/i;
const NETWORK_PATTERN = /ECONNRESET|ECONNREFUSED|ENOTFOUND|EAI_AGAIN|socket hang up|network|fetch failed/i;

/**
 * Pull the advertised maximum span out of a provider message, when it names one
 */
export function parseRangeBound(message: string): number | null {
    for (const pattern of RANGE_BOUND_PATTERNS) {
        const match = pattern.exec(message);
        if (!match?.[1]) continue;
        const base = parseInt(match[1].replace(/,/g, ''), 10);
        if (!Number.isFinite(base) || base <= 0) continue;
        return match[2] ? base * 1000 : base;
    }
    return null;
}

/**
 * Map a raw provider/transport error onto the taxonomy.
 * Anything that is not recognisably a range rejection is treated as transient.
 */
export function classifyRpcError(error: unknown, context: ErrorContext = {}): TransientRpcError | RangeExceededError {
    if (error instanceof TransientRpcError || error instanceof RangeExceededError) {
        return error;
    }

    const message = errorMessage(error);

    if (RANGE_PATTERNS.some(p => p.test(message))) {
        return new RangeExceededError(message, parseRangeBound(message), context, { cause: error });
    }

    let reason: TransientReason = 'unknown';
    if (ethers.isError(error, 'TIMEOUT') || TIMEOUT_PATTERN.test(message)) {
        reason = 'timeout';
    } else if (RATE_LIMIT_PATTERN.test(message)) {
        reason = 'rate_limit';
    } else if (ethers.isError(error, 'BAD_DATA') || error instanceof SyntaxError) {
        reason = 'malformed';
    } else if (ethers.isError(error, 'NETWORK_ERROR') || NETWORK_PATTERN.test(message)) {
        reason = 'network';
    }

    return new TransientRpcError(message, reason, context, { cause: error });
}

export class ConfigError extends FillwatchError { }
