import { afterEach, before, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { SchedulerConfig } from '../config';
import { HOUR_MS } from '../constants';
import type { MetadataStore } from '../db/store';
import { AlreadyRunning, RunNotDue, StorageUnavailable } from '../errors';
import { memoryStore, silenceLogs } from '../testUtils';
import { nextCronRun, Scheduler, type RunContext, type RunExecutor, type ScheduleFn } from './scheduler';

const CONFIG: SchedulerConfig = {
    enabled: true,
    intervalHours: 6,
    maxRunMs: 60_000,
    staleRunGraceMs: HOUR_MS,
    historicalBackfill: false
};

const START = Date.UTC(2024, 5, 15, 10);

const settle = () => new Promise(resolve => setImmediate(resolve));

/** Executor whose runs last until released, or until their signal aborts. */
function blockingExecutor() {
    const calls: RunContext[] = [];
    let release = () => {};
    const executor: RunExecutor = {
        execute: ctx => {
            calls.push(ctx);
            return new Promise<void>((resolve, reject) => {
                release = resolve;
                ctx.signal.addEventListener('abort', () => reject(ctx.signal.reason));
            });
        }
    };
    return { executor, calls, release: () => release() };
}

before(silenceLogs);

describe('nextCronRun', () => {
    it('finds the first hourly firing at or after the gate opens', () => {
        assert.equal(nextCronRun(Date.UTC(2024, 5, 15, 10, 30), null), Date.UTC(2024, 5, 15, 11));
        assert.equal(nextCronRun(Date.UTC(2024, 5, 15, 12), Date.UTC(2024, 5, 15, 17, 55)), Date.UTC(2024, 5, 15, 18));
        assert.equal(nextCronRun(Date.UTC(2024, 5, 15, 21), Date.UTC(2024, 5, 15, 21, 30)), Date.UTC(2024, 5, 15, 22));
        assert.equal(nextCronRun(Date.UTC(2024, 5, 15, 21, 59), Date.UTC(2024, 5, 15, 20)), Date.UTC(2024, 5, 15, 22));
    });
});

describe('Scheduler', () => {
    let store: MetadataStore;
    let clock: number;
    let scheduler: Scheduler | null;
    let scheduled: { expression: string; task: () => void; options: { timezone: string } }[];

    const schedule: ScheduleFn = (expression, task, options) => {
        scheduled.push({ expression, task, options });
        return { stop: () => undefined };
    };

    const make = (executor: RunExecutor, config: Partial<SchedulerConfig> = {}) => {
        scheduler = new Scheduler(store, executor, { ...CONFIG, ...config }, { schedule, now: () => clock });
        return scheduler;
    };

    beforeEach(() => {
        store = memoryStore();
        clock = START;
        scheduled = [];
        scheduler = null;
    });

    afterEach(async () => {
        await scheduler?.shutdown();
    });

    describe('mutual exclusion', () => {
        it('lets exactly one of two rapid triggers start a run', async () => {
            const { executor, release } = blockingExecutor();
            const s = make(executor);

            const [first, second] = await Promise.allSettled([s.triggerRun(), s.triggerRun()]);

            assert.equal(first.status, 'fulfilled');
            assert.ok(second.status === 'rejected' && second.reason instanceof AlreadyRunning);
            assert.equal(store.listRuns().length, 1);
            assert.equal(s.status().running, true);

            release();
            assert.ok(first.status === 'fulfilled');
            const run = await first.value.done;
            assert.equal(run?.status, 'succeeded');
            assert.equal(s.status().running, false);
        });

        it('refuses a forced trigger while a run is active', async () => {
            const { executor } = blockingExecutor();
            const s = make(executor);

            const ticket = await s.triggerRun(true);

            await assert.rejects(s.triggerRun(true), (e: unknown) => e instanceof AlreadyRunning && e.activeRunId === ticket.run_id);
        });

        it('skips a timer firing while a run is active', async () => {
            const { executor } = blockingExecutor();
            const s = make(executor);
            await s.triggerRun(true);

            assert.equal(await s.tick(), null);
            assert.equal(store.listRuns().length, 1);
        });
    });

    describe('interval gate', () => {
        it('rejects an early unforced run and lets a forced one through', async () => {
            const { executor, release } = blockingExecutor();
            const s = make(executor);
            const first = await s.triggerRun();
            release();
            await first.done;

            clock += HOUR_MS;
            await assert.rejects(s.triggerRun(), RunNotDue);

            const forced = await s.triggerRun(true);
            release();
            assert.equal((await forced.done)?.status, 'succeeded');
        });

        it('accepts a timer run once the interval has passed', async () => {
            const { executor, release } = blockingExecutor();
            const s = make(executor);
            const first = await s.triggerRun();
            release();
            await first.done;

            clock += 6 * HOUR_MS - 60_000;
            const ticket = await s.tick();
            assert.ok(ticket);
            release();
            assert.equal((await ticket.done)?.trigger, 'timer');
        });
    });

    describe('run outcomes', () => {
        it('fails a run that exceeds the maximum duration and releases the guard', async () => {
            const { executor, calls } = blockingExecutor();
            const s = make(executor, { maxRunMs: 20 });

            const ticket = await s.triggerRun();
            const run = await ticket.done;

            assert.equal(run?.status, 'failed');
            assert.equal(run?.error_details.at(-1)?.code, 'RUN_TIMEOUT');
            assert.equal(calls[0].signal.aborted, true);
            assert.equal(s.status().running, false);
            assert.ok((await s.triggerRun(true)).run_id > ticket.run_id);
        });

        it('records a failing run and keeps accepting runs', async () => {
            const s = make({
                execute: async () => {
                    throw new StorageUnavailable('disk gone');
                }
            });

            const run = await (await s.triggerRun()).done;

            assert.equal(run?.status, 'failed');
            assert.deepEqual(run?.error_details, [{ code: 'STORAGE_UNAVAILABLE', message: 'disk gone', scope: 'run' }]);
            assert.equal(run?.errors, 1);
            await s.triggerRun(true);
        });

        it('keeps scene-level errors on a successful run', async () => {
            const s = make({
                execute: async ctx => {
                    ctx.progress.counts = { scenes_found: 2, scenes_ingested: 2, scenes_processed: 1, errors: 1 };
                    ctx.progress.errors.push({ code: 'BAND_MISMATCH', message: 'sizes differ', scope: 'scene:S2A/vegetation' });
                }
            });

            const run = await (await s.triggerRun()).done;

            assert.equal(run?.status, 'succeeded');
            assert.equal(run?.scenes_processed, 1);
            assert.deepEqual(run?.error_details.map(e => e.code), ['BAND_MISMATCH']);
        });

        it('releases the guard when the executor throws before returning a promise', async () => {
            const s = make({
                execute: () => {
                    throw new Error('executor exploded');
                }
            });

            const run = await (await s.triggerRun()).done;

            assert.equal(run?.status, 'failed');
            assert.deepEqual(run?.error_details, [{ code: 'UNKNOWN', message: 'executor exploded', scope: 'run' }]);
            assert.equal(s.status().running, false);
            assert.equal(s.activeRunId(), null);
            const next = await s.triggerRun(true);
            assert.ok(next.run_id > (run?.id ?? 0));
        });

        it('stops the active run on cancel', async () => {
            const { executor } = blockingExecutor();
            const s = make(executor);
            assert.equal(s.cancel(), false);

            const ticket = await s.triggerRun();
            assert.equal(s.cancel(), true);
            const run = await ticket.done;

            assert.equal(run?.status, 'failed');
            assert.equal(run?.error_details.at(-1)?.code, 'RUN_CANCELLED');
        });
    });

    describe('start', () => {
        it('does not arm the timer when disabled but still takes manual triggers', async () => {
            const { executor, release } = blockingExecutor();
            const s = make(executor);

            s.start(6, false);

            assert.equal(scheduled.length, 0);
            assert.equal(s.status().enabled, false);
            assert.equal(s.status().next_run, null);
            const ticket = await s.triggerRun();
            release();
            assert.equal((await ticket.done)?.trigger, 'manual');
        });

        it('arms an hourly UTC cron timer whose firing requests a timer run', async () => {
            const { executor, release } = blockingExecutor();
            const s = make(executor);

            s.start(6, true);

            assert.equal(scheduled.length, 1);
            assert.equal(scheduled[0].expression, '0 * * * *');
            assert.deepEqual(scheduled[0].options, { timezone: 'UTC' });
            assert.equal(s.status().next_run, Date.UTC(2024, 5, 15, 11));

            scheduled[0].task();
            await settle();

            assert.equal(store.latestRun()?.trigger, 'timer');
            release();
        });

        it('keeps an interval that does not divide the day even across midnight', async () => {
            const { executor, release } = blockingExecutor();
            const s = make(executor, { intervalHours: 5 });
            s.start(5, true);

            clock = Date.UTC(2024, 5, 15, 20);
            const first = await s.tick();
            assert.ok(first);
            release();
            await first.done;
            assert.equal(s.status().next_run, Date.UTC(2024, 5, 16, 1));

            clock = Date.UTC(2024, 5, 16, 0);
            assert.equal(await s.tick(), null);

            clock = Date.UTC(2024, 5, 16, 1);
            const second = await s.tick();
            assert.ok(second);
            release();
            assert.equal((await second.done)?.started_at, Date.UTC(2024, 5, 16, 1));
            assert.equal(store.listRuns().length, 2);
        });

        it('fails runs left running by a previous process', () => {
            const stale = store.beginRun('timer', START - 2 * HOUR_MS);
            make(blockingExecutor().executor).start(6, false);

            assert.equal(store.getRun(stale)?.status, 'failed');
        });

        it('requests a startup backfill run when no run has succeeded', async () => {
            const { executor, release } = blockingExecutor();
            const s = make(executor, { historicalBackfill: true });

            s.start(6, false);
            await settle();

            assert.equal(store.latestRun()?.trigger, 'startup');
            release();
        });
    });

    it('reports status counters from the run history', async () => {
        const { executor, release } = blockingExecutor();
        const s = make(executor);
        const ok = await s.triggerRun();
        release();
        await ok.done;
        const cancelled = await s.triggerRun(true);
        s.cancel();
        await cancelled.done;

        assert.deepEqual(s.status(), {
            enabled: false,
            running: false,
            interval: 6,
            last_run: START,
            next_run: null,
            total_runs: 2,
            successful_runs: 1,
            failed_runs: 1
        });
    });
});
