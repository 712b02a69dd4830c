/**
 * Polygon OrderFilled scanning and decoding
 */
export {
    ORDER_FILLED_TOPIC,
    COLLATERAL_ASSET_ID,
    FillDecoder,
    VariantRegistry,
    createOrderFilledVariant,
    createVariantRegistry,
    deriveLegs,
    fillWarnings,
    tradeId,
    type DecodeResult,
    type DecodedFill,
    type ExchangeVariant,
    type OrderFilledPayload,
} from './orderFilledDecoder.js';
export {
    LogScanner,
    accountTopics,
    type AdvanceResult,
    type ScanOptions,
    type ScanResult,
    type WindowResult,
} from './logScanner.js';
