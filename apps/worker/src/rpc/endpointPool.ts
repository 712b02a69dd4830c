/**
 * Endpoint pool - ordered RPC endpoints with per-endpoint range limits and health
 *
 * Every remote call goes through call(): the active endpoint is tried first, transient
 * failures are retried on it per the retry policy, and once attempts run out the endpoint
 * cools down and the call moves on to the next available endpoint.
 * getLogs spans larger than an endpoint's bound are refused before anything is sent.
 */

import type { Logger } from 'pino';
import type { EndpointConfig } from '../config.js';
import { maskUrl } from '../config.js';
import {
    EndpointsExhaustedError,
    RangeExceededError,
    TransientRpcError,
    classifyRpcError,
    errorMessage,
} from '../errors.js';
import type { LogFilter, RawLog, RpcClient, TxReceipt } from '../ports/index.js';
import { sleep as defaultSleep, withRetry, type RetryPolicy, type Sleep } from '../retry.js';

// ============================================================================
// Types
// ============================================================================

export interface EndpointDescriptor {
    /** URL with any API key masked, safe to log */
    id: string;
    url: string;
    maxBlockRange: number;
    consecutiveFailures: number;
    /** Epoch ms; null when the endpoint is usable */
    cooldownUntil: number | null;
    totalCalls: number;
    totalFailures: number;
}

export type RpcClientFactory = (endpoint: EndpointConfig) => RpcClient;

export interface EndpointPoolOptions {
    retry: RetryPolicy;
    /** Minimum gap between any two issued calls, pool-wide */
    requestDelayMs: number;
    cooldownMs: number;
    logger: Logger;
    sleep?: Sleep;
    now?: () => number;
}

interface PoolEntry {
    descriptor: EndpointDescriptor;
    client: RpcClient;
}

// ============================================================================
// Pool
// ============================================================================

export class EndpointPool {
    private readonly entries: PoolEntry[];
    private readonly logger: Logger;
    private readonly sleep: Sleep;
    private readonly now: () => number;
    private current = 0;
    private lastCallAt: number | null = null;

    constructor(
        endpoints: EndpointConfig[],
        createClient: RpcClientFactory,
        private readonly options: EndpointPoolOptions,
    ) {
        if (endpoints.length === 0) {
            throw new Error('EndpointPool needs at least one endpoint');
        }

        this.logger = options.logger.child({ module: 'endpoint-pool' });
        this.sleep = options.sleep ?? defaultSleep;
        this.now = options.now ?? Date.now;
        this.entries = endpoints.map(endpoint => ({
            descriptor: {
                id: maskUrl(endpoint.url),
                url: endpoint.url,
                maxBlockRange: endpoint.maxBlockRange,
                consecutiveFailures: 0,
                cooldownUntil: null,
                totalCalls: 0,
                totalFailures: 0,
            },
            client: createClient(endpoint),
        }));
    }

    // ========================================================================
    // Calls
    // ========================================================================

    /**
     * eth_getLogs. Throws RangeExceededError without calling out when the span
     * is wider than the active endpoint accepts.
     */
    getLogs(filter: LogFilter): Promise<RawLog[]> {
        const span = filter.toBlock - filter.fromBlock + 1;
        return this.call('getLogs', client => client.getLogs(filter), {
            span,
            context: { address: filter.address, fromBlock: filter.fromBlock, toBlock: filter.toBlock },
        });
    }

    getBlockNumber(): Promise<number> {
        return this.call('getBlockNumber', client => client.getBlockNumber());
    }

    getBlockTimestamp(blockNumber: number): Promise<number> {
        return this.call('getBlockTimestamp', client => client.getBlockTimestamp(blockNumber), {
            context: { blockNumber },
        });
    }

    getReceipt(txHash: string): Promise<TxReceipt | null> {
        return this.call('getReceipt', client => client.getReceipt(txHash), { context: { txHash } });
    }

    /**
     * Run `fn` against the active endpoint with retry, cool-down and rotation
     */
    async call<T>(
        label: string,
        fn: (client: RpcClient) => Promise<T>,
        options: { span?: number; context?: Record<string, unknown> } = {},
    ): Promise<T> {
        const exhausted = new Set<number>();

        for (;;) {
            const index = this.nextAvailable(exhausted);
            if (index === null) {
                throw new EndpointsExhaustedError(`No RPC endpoint available for ${label}`, {
                    ...options.context,
                    label,
                    endpoints: this.entries.map(e => ({
                        id: e.descriptor.id,
                        cooldownUntil: e.descriptor.cooldownUntil,
                    })),
                });
            }

            if (index !== this.current) {
                this.logger.warn({
                    from: this.entries[this.current]?.descriptor.id,
                    to: this.entries[index]?.descriptor.id,
                    label,
                }, 'Rotating RPC endpoint');
                this.current = index;
            }

            const entry = this.entries[index];
            if (!entry) {
                throw new Error(`Endpoint index ${index} out of range`);
            }
            const { descriptor, client } = entry;
            const context = { ...options.context, endpoint: descriptor.id };

            try {
                return await withRetry(
                    () => this.attempt(descriptor, client, label, fn, options.span, context),
                    label,
                    this.options.retry,
                    {
                        logger: this.logger,
                        shouldRetry: error => error instanceof TransientRpcError,
                        sleep: this.sleep,
                        context,
                    },
                );
            } catch (error) {
                if (!(error instanceof TransientRpcError)) throw error;

                exhausted.add(index);
                descriptor.cooldownUntil = this.now() + this.options.cooldownMs;
                this.logger.warn({
                    ...context,
                    label,
                    cooldownMs: this.options.cooldownMs,
                    consecutiveFailures: descriptor.consecutiveFailures,
                    error: error.message,
                }, 'RPC endpoint cooling down');

                if (!this.options.retry.rotateOnExhaustion) throw error;
            }
        }
    }

    private async attempt<T>(
        descriptor: EndpointDescriptor,
        client: RpcClient,
        label: string,
        fn: (client: RpcClient) => Promise<T>,
        span: number | undefined,
        context: Record<string, unknown>,
    ): Promise<T> {
        if (span !== undefined && span > descriptor.maxBlockRange) {
            throw new RangeExceededError(
                `${label} span of ${span} blocks exceeds the endpoint limit of ${descriptor.maxBlockRange}`,
                descriptor.maxBlockRange,
                { ...context, span },
            );
        }

        await this.throttle();
        descriptor.totalCalls++;

        try {
            const result = await fn(client);
            descriptor.consecutiveFailures = 0;
            return result;
        } catch (error) {
            const classified = classifyRpcError(error, { ...context, label });

            if (classified instanceof RangeExceededError) {
                throw this.recordRangeRejection(descriptor, classified, span, context);
            }

            descriptor.totalFailures++;
            descriptor.consecutiveFailures++;
            throw classified;
        }
    }

    /**
     * Lower the endpoint's bound after the provider refused a span
     */
    private recordRangeRejection(
        descriptor: EndpointDescriptor,
        error: RangeExceededError,
        span: number | undefined,
        context: Record<string, unknown>,
    ): RangeExceededError {
        const rejected = span ?? descriptor.maxBlockRange;
        const advertised = error.maxBlockRange ?? Math.floor(rejected / 2);
        const discovered = Math.max(1, Math.min(advertised, rejected - 1, descriptor.maxBlockRange));

        this.logger.warn({
            ...context,
            rejectedSpan: rejected,
            previousMax: descriptor.maxBlockRange,
            discoveredMax: discovered,
            error: errorMessage(error),
        }, 'Endpoint rejected block range, lowering its limit');

        descriptor.maxBlockRange = discovered;
        return new RangeExceededError(error.message, discovered, { ...context, span: rejected }, { cause: error });
    }

    private async throttle(): Promise<void> {
        const delay = this.options.requestDelayMs;
        if (delay > 0 && this.lastCallAt !== null) {
            const wait = this.lastCallAt + delay - this.now();
            if (wait > 0) {
                await this.sleep(wait);
            }
        }
        this.lastCallAt = this.now();
    }

    private isCoolingDown(descriptor: EndpointDescriptor): boolean {
        if (descriptor.cooldownUntil === null) return false;
        if (this.now() >= descriptor.cooldownUntil) {
            descriptor.cooldownUntil = null;
            return false;
        }
        return true;
    }

    /**
     * First usable endpoint, starting from the active one
     */
    private nextAvailable(skip: ReadonlySet<number> = new Set()): number | null {
        for (let offset = 0; offset < this.entries.length; offset++) {
            const index = (this.current + offset) % this.entries.length;
            const entry = this.entries[index];
            if (!entry || skip.has(index)) continue;
            if (!this.isCoolingDown(entry.descriptor)) return index;
        }
        return null;
    }

    // ========================================================================
    // State
    // ========================================================================

    /**
     * Bound of the endpoint the next call would use
     */
    maxBlockRange(): number {
        const index = this.nextAvailable() ?? this.current;
        return this.entries[index]?.descriptor.maxBlockRange ?? 1;
    }

    activeEndpoint(): EndpointDescriptor {
        const entry = this.entries[this.current];
        if (!entry) {
            throw new Error('EndpointPool has no active endpoint');
        }
        return { ...entry.descriptor };
    }

    describe(): EndpointDescriptor[] {
        return this.entries.map(e => ({ ...e.descriptor }));
    }

    close(): void {
        for (const entry of this.entries) {
            entry.client.destroy();
        }
    }
}
