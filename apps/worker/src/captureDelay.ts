/**
 * Capture delay - seconds between a trade's block time and its ingestion
 * Observability only: nothing branches on it.
 */

export type CaptureDelayClass = 'realtime' | 'slow' | 'delayed' | 'historical';

export function captureDelaySeconds(blockTimestamp: Date, ingestedAt: Date): number {
    return Math.max(0, Math.floor((ingestedAt.getTime() - blockTimestamp.getTime()) / 1000));
}

export function classifyCaptureDelay(seconds: number): CaptureDelayClass {
    if (seconds < 60) return 'realtime';
    if (seconds < 300) return 'slow';
    if (seconds < 3600) return 'delayed';
    return 'historical';
}
