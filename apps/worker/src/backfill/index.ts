/**
 * Backfill of positions whose earlier buys were never scanned
 */
export {
    backfillPositions,
    type BackfillOptions,
    type BackfillResult,
    type PositionBackfillResult,
} from './positionBackfill.js';
