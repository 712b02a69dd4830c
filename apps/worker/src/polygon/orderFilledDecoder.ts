/**
 * OrderFilled event decoder for the CTF Exchange and NegRisk CTF Exchange contracts
 *
 * The OrderFilled event is emitted when an order is filled on either exchange on Polygon.
 * Each exchange is a variant in the registry, keyed by contract address, owning its own
 * ABI fragment and decode function. decodeFill never throws: a log that cannot be decoded
 * still becomes a fill, with side "unknown" and the raw payload kept for reconciliation.
 */

import { ethers } from 'ethers';
import {
    clampDecimal,
    divide,
    toDecimal,
    toDecimalString,
    type ContractVariant,
    type Trade,
    type TradeRole,
    type TradeSide,
} from '@fillwatch/core';
import { DecodeError, errorMessage } from '../errors.js';
import type { RawLog } from '../ports/index.js';

/**
 * OrderFilled event signature
 * event OrderFilled(
 *   bytes32 indexed orderHash,
 *   address indexed maker,
 *   address indexed taker,
 *   uint256 makerAssetId,
 *   uint256 takerAssetId,
 *   uint256 makerAmountFilled,
 *   uint256 takerAmountFilled,
 *   uint256 fee
 * )
 */
export const ORDER_FILLED_TOPIC = ethers.id(
    'OrderFilled(bytes32,address,address,uint256,uint256,uint256,uint256,uint256)'
);

const ORDER_FILLED_ABI = [
    'event OrderFilled(bytes32 indexed orderHash, address indexed maker, address indexed taker, uint256 makerAssetId, uint256 takerAssetId, uint256 makerAmountFilled, uint256 takerAmountFilled, uint256 fee)',
] as const;

/**
 * Collateral (USDC) asset ID (0 = USDC in CTF Exchange)
 */
export const COLLATERAL_ASSET_ID = 0n;

/**
 * Decimals for USDC (6 decimals)
 */
export const USDC_DECIMALS = 6;

/**
 * Decimals for CTF tokens (6 decimals to match USDC)
 */
export const CTF_TOKEN_DECIMALS = 6;

export const UNKNOWN = 'unknown';

// Prices are kept to 18 decimal places
const PRICE_DECIMALS = 18;

// ============================================================================
// Types
// ============================================================================

/**
 * Fixed payload every variant decodes to
 */
export interface OrderFilledPayload {
    orderHash: string;
    maker: string;
    taker: string;
    makerAssetId: bigint;
    takerAssetId: bigint;
    makerAmountFilled: bigint;
    takerAmountFilled: bigint;
    fee: bigint;
}

export interface ExchangeVariant {
    readonly variant: ContractVariant;
    /** Lower-case contract address */
    readonly address: string;
    readonly abi: readonly string[];
    readonly topic: string;
    /**
     * Throws DecodeError when the log does not fit the layout
     */
    decode(log: RawLog): OrderFilledPayload;
}

/**
 * Everything a trade carries that the log alone determines
 */
export type DecodedFill = Omit<
    Trade,
    'blockTimestamp' | 'gasUsed' | 'gasPrice' | 'executionStatus' | 'ingestedAt' | 'captureDelaySeconds'
>;

export type DecodeResult =
    | { ok: true; fill: DecodedFill }
    | { ok: false; fill: DecodedFill; error: DecodeError };

// ============================================================================
// Variants
// ============================================================================

function readBigInt(value: unknown, field: string): bigint {
    if (typeof value !== 'bigint') {
        throw new DecodeError(`OrderFilled field ${field} is not an integer`, { field });
    }
    return value;
}

function readString(value: unknown, field: string): string {
    if (typeof value !== 'string') {
        throw new DecodeError(`OrderFilled field ${field} is not a string`, { field });
    }
    return value;
}

/**
 * Variant for an exchange emitting the standard OrderFilled layout.
 * Both deployed exchanges use it today; a future layout gets its own factory.
 */
export function createOrderFilledVariant(variant: ContractVariant, address: string): ExchangeVariant {
    const iface = new ethers.Interface(ORDER_FILLED_ABI);

    return {
        variant,
        address: address.toLowerCase(),
        abi: ORDER_FILLED_ABI,
        topic: ORDER_FILLED_TOPIC,
        decode(log: RawLog): OrderFilledPayload {
            if (log.topics.length !== 4) {
                throw new DecodeError(`Expected 4 topics, got ${log.topics.length}`, {
                    variant,
                    topics: log.topics.length,
                });
            }
            if (log.topics[0]?.toLowerCase() !== ORDER_FILLED_TOPIC) {
                throw new DecodeError('Log is not an OrderFilled event', { variant, topic0: log.topics[0] });
            }

            let parsed: ethers.LogDescription | null;
            try {
                parsed = iface.parseLog({ topics: log.topics, data: log.data });
            } catch (error) {
                throw new DecodeError(`Undecodable OrderFilled data: ${errorMessage(error)}`, { variant }, { cause: error });
            }
            if (!parsed) {
                throw new DecodeError('OrderFilled log did not match the ABI', { variant });
            }

            return {
                orderHash: readString(parsed.args[0], 'orderHash'),
                maker: readString(parsed.args[1], 'maker').toLowerCase(),
                taker: readString(parsed.args[2], 'taker').toLowerCase(),
                makerAssetId: readBigInt(parsed.args[3], 'makerAssetId'),
                takerAssetId: readBigInt(parsed.args[4], 'takerAssetId'),
                makerAmountFilled: readBigInt(parsed.args[5], 'makerAmountFilled'),
                takerAmountFilled: readBigInt(parsed.args[6], 'takerAmountFilled'),
                fee: readBigInt(parsed.args[7], 'fee'),
            };
        },
    };
}

/**
 * Variants keyed by contract address
 */
export class VariantRegistry {
    private readonly byAddress = new Map<string, ExchangeVariant>();

    constructor(variants: ExchangeVariant[]) {
        for (const variant of variants) {
            this.byAddress.set(variant.address, variant);
        }
    }

    get(address: string): ExchangeVariant | undefined {
        return this.byAddress.get(address.toLowerCase());
    }

    list(): ExchangeVariant[] {
        return [...this.byAddress.values()];
    }
}

export function createVariantRegistry(exchanges: { ctf: string; negRisk: string }): VariantRegistry {
    return new VariantRegistry([
        createOrderFilledVariant('ctf', exchanges.ctf),
        createOrderFilledVariant('neg_risk', exchanges.negRisk),
    ]);
}

// ============================================================================
// Side derivation
// ============================================================================

interface FillLegs {
    side: 'buy' | 'sell';
    assetId: string;
    usdcAmount: bigint;
    tokenAmount: bigint;
}

/**
 * In CTF Exchange:
 * - If makerAssetId = 0 (USDC), the maker pays USDC for tokens: maker BUYS, taker SELLS
 * - If takerAssetId = 0 (USDC), the taker pays USDC for tokens: taker BUYS, maker SELLS
 */
export function deriveLegs(payload: OrderFilledPayload, role: TradeRole): FillLegs {
    const makerPaysCollateral = payload.makerAssetId === COLLATERAL_ASSET_ID;
    const takerPaysCollateral = payload.takerAssetId === COLLATERAL_ASSET_ID;

    if (makerPaysCollateral && !takerPaysCollateral) {
        return {
            side: role === 'maker' ? 'buy' : 'sell',
            assetId: payload.takerAssetId.toString(),
            usdcAmount: payload.makerAmountFilled,
            tokenAmount: payload.takerAmountFilled,
        };
    }

    if (takerPaysCollateral && !makerPaysCollateral) {
        return {
            side: role === 'maker' ? 'sell' : 'buy',
            assetId: payload.makerAssetId.toString(),
            usdcAmount: payload.takerAmountFilled,
            tokenAmount: payload.makerAmountFilled,
        };
    }

    // Token-to-token swap, or both legs collateral
    throw new DecodeError('Neither or both legs are collateral', {
        makerAssetId: payload.makerAssetId.toString(),
        takerAssetId: payload.takerAssetId.toString(),
    });
}

/**
 * Token-to-token swap: keep the maker's leg. Nothing to keep when both legs are collateral.
 */
function swapLeg(payload: OrderFilledPayload): Partial<Pick<DecodedFill, 'assetId' | 'amount'>> {
    if (payload.makerAssetId === COLLATERAL_ASSET_ID) return {};
    return {
        assetId: payload.makerAssetId.toString(),
        amount: units(payload.makerAmountFilled, CTF_TOKEN_DECIMALS),
    };
}

function units(value: bigint, decimals: number): string {
    return toDecimalString(toDecimal(ethers.formatUnits(value, decimals)));
}

// ============================================================================
// Decode
// ============================================================================

/**
 * Dedupe key: one trade per (log, watched account)
 */
export function tradeId(txHash: string, logIndex: number, account: string): string {
    return `${txHash.toLowerCase()}:${logIndex}:${account.toLowerCase()}`;
}

function topicAddress(topic: string | undefined): string | null {
    if (!topic || !ethers.isHexString(topic, 32)) return null;
    return ethers.getAddress(ethers.dataSlice(topic, 12)).toLowerCase();
}

export class FillDecoder {
    constructor(readonly registry: VariantRegistry) { }

    /**
     * Turn a matched log into a fill for the watched account in the given role
     */
    decodeFill(log: RawLog, account: string, role: TradeRole): DecodeResult {
        const variant = this.registry.get(log.address);
        const base = this.baseFill(log, account, role, variant);

        if (!variant) {
            return this.failed(base, new DecodeError('Log emitted by an unknown contract', {
                address: log.address.toLowerCase(),
            }));
        }

        let payload: OrderFilledPayload;
        try {
            payload = variant.decode(log);
        } catch (error) {
            return this.failed(base, toDecodeError(error));
        }

        const counterparty = role === 'maker' ? payload.taker : payload.maker;
        const withPayload: DecodedFill = {
            ...base,
            counterparty,
            orderHash: payload.orderHash,
            fee: units(payload.fee, USDC_DECIMALS),
        };

        let legs: FillLegs;
        try {
            legs = deriveLegs(payload, role);
        } catch (error) {
            return this.failed({ ...withPayload, ...swapLeg(payload) }, toDecodeError(error));
        }

        if (legs.tokenAmount === 0n) {
            return this.failed(
                { ...withPayload, assetId: legs.assetId, usdcAmount: units(legs.usdcAmount, USDC_DECIMALS) },
                new DecodeError('Fill has a zero token amount', { assetId: legs.assetId }),
            );
        }

        const amount = toDecimal(ethers.formatUnits(legs.tokenAmount, CTF_TOKEN_DECIMALS));
        const usdc = toDecimal(ethers.formatUnits(legs.usdcAmount, USDC_DECIMALS));
        const price = clampDecimal(divide(usdc, amount), 0, 1).toDecimalPlaces(PRICE_DECIMALS);

        return {
            ok: true,
            fill: {
                ...withPayload,
                assetId: legs.assetId,
                side: legs.side,
                amount: toDecimalString(amount),
                signedAmount: toDecimalString(legs.side === 'buy' ? amount : amount.negated()),
                price: toDecimalString(price),
                usdcAmount: toDecimalString(usdc),
            },
        };
    }

    private baseFill(
        log: RawLog,
        account: string,
        role: TradeRole,
        variant: ExchangeVariant | undefined,
    ): DecodedFill {
        const accountLower = account.toLowerCase();
        // Maker is topic 2, taker topic 3
        const counterparty = topicAddress(role === 'maker' ? log.topics[3] : log.topics[2]);
        const orderHash = log.topics[1] && ethers.isHexString(log.topics[1], 32) ? log.topics[1] : null;
        const side: TradeSide = 'unknown';

        return {
            id: tradeId(log.transactionHash, log.logIndex, accountLower),
            txHash: log.transactionHash.toLowerCase(),
            logIndex: log.logIndex,
            blockNumber: log.blockNumber,
            account: accountLower,
            counterparty: counterparty ?? UNKNOWN,
            role,
            contractVariant: variant?.variant ?? UNKNOWN,
            exchangeAddress: log.address.toLowerCase(),
            orderHash,
            assetId: UNKNOWN,
            side,
            amount: '0',
            signedAmount: '0',
            price: '0',
            usdcAmount: '0',
            fee: '0',
            decodeFailed: false,
            decodeError: null,
            rawData: log.data,
            rawTopics: [...log.topics],
        };
    }

    /**
     * Amounts the failure left undecoded stay at "0"; no side, so no signed amount or price.
     */
    private failed(fill: DecodedFill, error: DecodeError): DecodeResult {
        return {
            ok: false,
            error,
            fill: {
                ...fill,
                side: 'unknown',
                signedAmount: '0',
                price: '0',
                decodeFailed: true,
                decodeError: error.message,
            },
        };
    }
}

function toDecodeError(error: unknown): DecodeError {
    if (error instanceof DecodeError) return error;
    return new DecodeError(errorMessage(error), {}, { cause: error });
}

// ============================================================================
// Sanity checks
// ============================================================================

const MIN_PRICE = toDecimal('0.0001');
const MIN_AMOUNT = toDecimal('0.000001');
const MAX_AMOUNT = toDecimal('1000000');

/**
 * Plausibility warnings for a decoded fill. Never blocks storage.
 */
export function fillWarnings(fill: Pick<DecodedFill, 'price' | 'amount' | 'decodeFailed'>): string[] {
    if (fill.decodeFailed) return [];

    const warnings: string[] = [];
    const price = toDecimal(fill.price);
    const amount = toDecimal(fill.amount);

    if (price.lessThanOrEqualTo(MIN_PRICE) || price.greaterThan(1)) {
        warnings.push(`price ${fill.price} outside (0.0001, 1]`);
    }
    if (amount.lessThan(MIN_AMOUNT) || amount.greaterThan(MAX_AMOUNT)) {
        warnings.push(`amount ${fill.amount} outside [0.000001, 1000000]`);
    }
    return warnings;
}
