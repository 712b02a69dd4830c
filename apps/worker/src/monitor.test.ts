import { describe, expect, it } from 'vitest';
import { MemoryLedgerRepository } from '@fillwatch/db';
import { createIngestionContext, type IngestionContext } from './context.js';
import { FatalLoopError } from './errors.js';
import { HealthTracker, waitForDatabase } from './health.js';
import { createSilentLogger } from './logger.js';
import { StopSignal, runMonitor } from './monitor.js';
import type { AdvanceResult } from './polygon/index.js';
import { FakeChain, FakeClock, FakeRpcClient, testConfig } from './testing/fakes.js';

function advanced(caughtUp: boolean): AdvanceResult {
    return {
        tradesFound: 1,
        tradesStored: 1,
        duplicates: 0,
        decodeFailures: 0,
        windowsProcessed: 1,
        newCursor: 100,
        head: caughtUp ? 100 : 600,
        backlog: caughtUp ? 0 : 500,
        caughtUp,
    };
}

/**
 * Scanner stand-in that plays back results and failures in order
 */
class ScriptedScanner {
    calls = 0;

    constructor(private readonly steps: Array<AdvanceResult | Error>) { }

    async advance(): Promise<AdvanceResult> {
        const step = this.steps[this.calls++];
        if (!step) throw new Error('script exhausted');
        if (step instanceof Error) throw step;
        return step;
    }
}

function scripted(steps: Array<AdvanceResult | Error>): ScriptedScanner {
    return new ScriptedScanner(steps);
}

function context(env: Record<string, string> = {}): IngestionContext {
    return createIngestionContext(
        testConfig({ POLL_INTERVAL_MS: '1000', MAX_CONSECUTIVE_ERRORS: '3', ...env }),
        createSilentLogger(),
        new MemoryLedgerRepository(),
        { createClient: endpoint => new FakeRpcClient(endpoint.url, new FakeChain(0)) },
    );
}

describe('runMonitor', () => {
    it('gives up after too many consecutive failures', async () => {
        const clock = new FakeClock();
        const scanner = scripted([new Error('rpc down'), new Error('rpc down'), new Error('rpc down')]);

        const error = await runMonitor(context(), {
            shouldContinue: () => true,
            sleep: clock.sleep,
            now: clock.now,
            scanner,
        }).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(FatalLoopError);
        expect(error instanceof FatalLoopError && error.consecutiveErrors).toBe(3);
        expect(clock.sleeps).toEqual([2000, 2000]);
    });

    it('resets the failure count after a successful advance', async () => {
        const clock = new FakeClock();
        const health = new HealthTracker();
        const scanner = scripted([
            new Error('rpc down'),
            new Error('rpc down'),
            advanced(true),
            new Error('rpc down'),
            new Error('rpc down'),
            advanced(false),
            advanced(true),
        ]);

        const summary = await runMonitor(context(), {
            shouldContinue: () => scanner.calls < 7,
            sleep: clock.sleep,
            now: clock.now,
            scanner,
            health,
        });

        expect(summary).toEqual({ iterations: 7, tradesStored: 3 });
        // errors back off, steady state polls, catch-up goes again at once
        expect(clock.sleeps).toEqual([2000, 2000, 1000, 2000, 2000]);
        expect(health.getWorkerHealth()).toMatchObject({
            totalAdvances: 3,
            totalErrors: 4,
            consecutiveErrors: 0,
            tradesStored: 3,
            isHealthy: true,
        });
    });

    it('finishes the current iteration and exits once stopped', async () => {
        const clock = new FakeClock();
        const signal = new StopSignal();
        let calls = 0;
        const scanner = {
            advance: async (): Promise<AdvanceResult> => {
                calls++;
                signal.stop();
                return advanced(true);
            },
        };

        const summary = await runMonitor(context(), {
            shouldContinue: signal.shouldContinue,
            sleep: clock.sleep,
            now: clock.now,
            scanner,
        });

        expect(summary.iterations).toBe(1);
        expect(calls).toBe(1);
        expect(clock.sleeps).toEqual([]);
    });

    it('does not start when already stopped', async () => {
        const scanner = scripted([]);

        const summary = await runMonitor(context(), { shouldContinue: () => false, scanner });

        expect(summary).toEqual({ iterations: 0, tradesStored: 0 });
        expect(scanner.calls).toBe(0);
    });
});

describe('StopSignal', () => {
    it('wakes a pending sleep on stop', async () => {
        const signal = new StopSignal();
        const slept = signal.sleep(60_000);

        signal.stop();

        await expect(slept).resolves.toBeUndefined();
        expect(signal.isStopped).toBe(true);
        expect(signal.shouldContinue()).toBe(false);
    });

    it('does not sleep once stopped', async () => {
        const signal = new StopSignal();
        signal.stop();

        await expect(signal.sleep(60_000)).resolves.toBeUndefined();
    });
});

describe('HealthTracker', () => {
    it('reports degraded after three consecutive errors', () => {
        const health = new HealthTracker();
        health.recordError(new Error('one'));
        health.recordError(new Error('two'));
        expect(health.getWorkerHealth().isHealthy).toBe(true);

        health.recordError(new Error('three'));

        expect(health.getWorkerHealth()).toMatchObject({
            isHealthy: false,
            consecutiveErrors: 3,
            lastError: 'three',
        });
    });

    it('summarizes endpoints', () => {
        const health = new HealthTracker(() => new Date(5_000));
        health.recordAdvance(advanced(true));

        const summary = health.getHealthSummary([{
            id: 'http://rpc-a.test',
            url: 'http://rpc-a.test',
            maxBlockRange: 40,
            consecutiveFailures: 0,
            cooldownUntil: 10_000,
            totalCalls: 12,
            totalFailures: 2,
        }]);

        expect(summary.cursor).toBe(100);
        expect(summary.endpoints).toEqual([{
            id: 'http://rpc-a.test',
            maxBlockRange: 40,
            calls: 12,
            failures: 2,
            coolingDown: true,
        }]);
    });
});

describe('waitForDatabase', () => {
    it('retries the ping until the database answers', async () => {
        const clock = new FakeClock();
        const repository = new MemoryLedgerRepository();
        let pings = 0;
        repository.ping = async () => {
            pings++;
            if (pings < 3) throw new Error('ECONNREFUSED');
        };

        const ready = await waitForDatabase(repository, createSilentLogger(), { maxAttempts: 5, delayMs: 100 }, clock.sleep);

        expect(ready).toBe(true);
        expect(pings).toBe(3);
        expect(clock.sleeps).toEqual([100, 100]);
    });

    it('returns false once attempts run out', async () => {
        const repository = new MemoryLedgerRepository();
        repository.ping = async () => {
            throw new Error('ECONNREFUSED');
        };

        const ready = await waitForDatabase(repository, createSilentLogger(), { maxAttempts: 2, delayMs: 0 }, new FakeClock().sleep);

        expect(ready).toBe(false);
    });
});
