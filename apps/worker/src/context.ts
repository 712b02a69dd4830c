/**
 * Ingestion context - everything the loop's components share, built once by the entry point
 */

import type { Logger } from 'pino';
import type { LedgerRepository, LedgerSettings } from '@fillwatch/core';
import type { WorkerConfig } from './config.js';
import { TradeIngestor } from './ingest/index.js';
import { FillDecoder, createVariantRegistry } from './polygon/orderFilledDecoder.js';
import { EndpointPool, type RpcClientFactory } from './rpc/endpointPool.js';
import { EthersRpcClient } from './rpc/ethersClient.js';
import type { Sleep } from './retry.js';

export interface IngestionContext {
    config: WorkerConfig;
    logger: Logger;
    pool: EndpointPool;
    repository: LedgerRepository;
    decoder: FillDecoder;
    ingestor: TradeIngestor;
    ledger: LedgerSettings;
}

export interface ContextOverrides {
    createClient?: RpcClientFactory;
    sleep?: Sleep;
    now?: () => number;
}

export function createIngestionContext(
    config: WorkerConfig,
    logger: Logger,
    repository: LedgerRepository,
    overrides: ContextOverrides = {},
): IngestionContext {
    const createClient = overrides.createClient ?? (endpoint => new EthersRpcClient(endpoint.url));
    const now = overrides.now;

    const pool = new EndpointPool(config.endpoints, createClient, {
        retry: config.retry,
        requestDelayMs: config.requestDelayMs,
        cooldownMs: config.endpointCooldownMs,
        logger,
        sleep: overrides.sleep,
        now,
    });

    return {
        config,
        logger,
        pool,
        repository,
        decoder: new FillDecoder(createVariantRegistry(config.exchanges)),
        ingestor: new TradeIngestor(
            repository,
            config.ledger,
            logger,
            now ? () => new Date(now()) : undefined,
        ),
        ledger: config.ledger,
    };
}
