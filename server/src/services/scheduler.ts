import cron from 'node-cron';
import type { SchedulerConfig } from '../config';
import { HOUR_MS, INTERVAL_GATE_SLACK_MS } from '../constants';
import type { MetadataStore } from '../db/store';
import { AlreadyRunning, describeError, isPipelineError, RunCancelled, RunNotDue, RunTimeout, toRunError } from '../errors';
import { createLogger } from '../log';
import type { PipelineRun, RunCounts, RunErrorRecord, RunTrigger, SchedulerStatus } from '../types';
import { RequestChannel } from './runChannel';

const log = createLogger('SCHEDULER');

export interface RunProgress {
    counts: RunCounts;
    errors: RunErrorRecord[];
}

export interface RunContext {
    runId: number;
    trigger: RunTrigger;
    /** Aborted on cancellation or timeout; checked between scenes. */
    signal: AbortSignal;
    progress: RunProgress;
}

export interface RunExecutor {
    execute(ctx: RunContext): Promise<void>;
}

export interface RunRequest {
    trigger: RunTrigger;
    force: boolean;
}

export interface RunTicket {
    run_id: number;
    /** Settles with the closed run record once the run has finished. */
    done: Promise<PipelineRun | null>;
}

export type ScheduleFn = (expression: string, task: () => void, options: { timezone: string }) => { stop(): void };

export interface SchedulerDeps {
    schedule?: ScheduleFn;
    now?: () => number;
}

interface ActiveRun {
    runId: number;
    controller: AbortController;
    done: Promise<PipelineRun | null>;
}

// The timer fires every hour; the interval gate decides which firings start a run.
export const CRON_EXPRESSION = '0 * * * *';

/**
 * First hourly firing after `now` that the interval gate lets through, given when the gate opens.
 */
export function nextCronRun(now: number, dueAt: number | null): number {
    let next = Math.floor(now / HOUR_MS) * HOUR_MS + HOUR_MS;
    if (dueAt !== null && dueAt > next) next = Math.ceil(dueAt / HOUR_MS) * HOUR_MS;
    return next;
}

const emptyCounts = (): RunCounts => ({ scenes_found: 0, scenes_ingested: 0, scenes_processed: 0, errors: 0 });

/**
 * Drives pipeline runs from a cron timer and manual triggers. Both send run requests over one channel;
 * a single worker applies the interval gate and the mutual-exclusion guard, so the two can never overlap.
 */
export class Scheduler {
    private readonly requests = new RequestChannel<RunRequest, RunTicket>();
    private readonly schedule: ScheduleFn;
    private readonly now: () => number;
    private readonly worker: Promise<void>;
    private task: { stop(): void } | null = null;
    private active: ActiveRun | null = null;
    private enabled = false;
    private intervalHours: number;

    constructor(private readonly store: MetadataStore, private readonly executor: RunExecutor, private readonly config: SchedulerConfig, deps: SchedulerDeps = {}) {
        this.schedule = deps.schedule ?? cron.schedule;
        this.now = deps.now ?? Date.now;
        this.intervalHours = config.intervalHours;
        this.worker = this.requests.serve(request => this.begin(request));
    }

    /**
     * Arms the interval timer (unless disabled) after clearing runs a previous process left behind.
     */
    start(intervalHours = this.config.intervalHours, enabled = this.config.enabled): void {
        this.stop();
        this.intervalHours = intervalHours;
        this.enabled = enabled;

        const reset = this.store.resetStaleRuns(this.config.staleRunGraceMs, this.now());
        if (reset > 0) log.warn(`Marked ${reset} stale run(s) as failed`);

        if (!enabled) {
            log.info('Scheduler disabled; manual triggers remain available');
        } else {
            this.task = this.schedule(CRON_EXPRESSION, () => {
                void this.tick();
            }, { timezone: 'UTC' });
            log.info(`Scheduled every ${intervalHours}h (checked at ${CRON_EXPRESSION} UTC)`);
        }

        if (this.config.historicalBackfill && this.store.runTotals().succeeded === 0) {
            log.info('No successful run yet; requesting historical backfill');
            this.requests.request({ trigger: 'startup', force: true }).catch(e => log.warn(`Startup run not started: ${describeError(e)}`));
        }
    }

    /** Disarms the timer. Runs already in progress continue. */
    stop(): void {
        this.task?.stop();
        this.task = null;
        this.enabled = false;
    }

    /** What the timer does on each firing; errors are logged, never thrown. */
    async tick(): Promise<RunTicket | null> {
        try {
            return await this.requests.request({ trigger: 'timer', force: false });
        } catch (e) {
            if (e instanceof AlreadyRunning || e instanceof RunNotDue) log.info(`Timer run skipped: ${e.message}`);
            else log.error('Timer run could not start', e);
            return null;
        }
    }

    /**
     * Starts a run now. `force` skips the interval gate but never the single-run guard.
     */
    triggerRun(force = false, trigger: RunTrigger = 'manual'): Promise<RunTicket> {
        log.info(`Manual trigger (force=${force})`);
        return this.requests.request({ trigger, force });
    }

    /** Asks the active run to stop at its next checkpoint. */
    cancel(): boolean {
        if (!this.active) return false;
        log.warn(`Cancelling run ${this.active.runId}`);
        this.active.controller.abort(new RunCancelled());
        return true;
    }

    status(): SchedulerStatus {
        const latest = this.store.latestRun();
        const totals = this.store.runTotals();
        return {
            enabled: this.enabled,
            running: this.active !== null,
            interval: this.intervalHours,
            last_run: latest?.started_at ?? null,
            next_run: this.enabled ? nextCronRun(this.now(), this.dueAt(latest)) : null,
            total_runs: totals.total,
            successful_runs: totals.succeeded,
            failed_runs: totals.failed
        };
    }

    activeRunId(): number | null {
        return this.active?.runId ?? null;
    }

    /**
     * Stops the timer, cancels the active run and waits for it to close.
     */
    async shutdown(): Promise<void> {
        this.stop();
        const active = this.active;
        this.cancel();
        this.requests.close();
        await this.worker;
        if (active) await active.done;
    }

    private begin(request: RunRequest): RunTicket {
        if (this.active) throw new AlreadyRunning(this.active.runId);

        const now = this.now();
        if (!request.force) {
            const dueAt = this.dueAt(this.store.latestRun());
            if (dueAt !== null && now < dueAt) throw new RunNotDue(dueAt);
        }

        this.store.resetStaleRuns(this.config.staleRunGraceMs, now);
        const runId = this.store.beginRun(request.trigger, now);
        // Held before the executor starts: a synchronous failure releases it from inside run()
        const active: ActiveRun = { runId, controller: new AbortController(), done: Promise.resolve(null) };
        this.active = active;
        log.info(`Run ${runId} started (${request.trigger})`);
        active.done = this.run(runId, request.trigger, active.controller);
        return { run_id: runId, done: active.done };
    }

    /** When the interval gate opens after the given run; null when nothing has run yet. */
    private dueAt(latest: PipelineRun | null): number | null {
        return latest ? latest.started_at + this.intervalHours * HOUR_MS - INTERVAL_GATE_SLACK_MS : null;
    }

    private async run(runId: number, trigger: RunTrigger, controller: AbortController): Promise<PipelineRun | null> {
        const progress: RunProgress = { counts: emptyCounts(), errors: [] };
        const { maxRunMs } = this.config;
        let timer: NodeJS.Timeout | undefined;
        const finish = log.time(`Run ${runId}`);

        try {
            const work = this.executor.execute({ runId, trigger, signal: controller.signal, progress });
            const timeout = new Promise<never>((_, reject) => {
                timer = setTimeout(() => reject(new RunTimeout(maxRunMs)), maxRunMs);
            });
            try {
                await Promise.race([work, timeout]);
            } catch (e) {
                if (e instanceof RunTimeout) {
                    controller.abort(e);
                    work.catch(late => log.warn(`Run ${runId} stopped after timeout: ${describeError(late)}`));
                }
                throw e;
            }
            this.close(runId, 'succeeded', progress);
        } catch (e) {
            log.error(`Run ${runId} failed`, e);
            progress.errors.push(toRunError(e, 'run'));
            progress.counts.errors = progress.errors.length;
            this.close(runId, 'failed', progress);
        } finally {
            clearTimeout(timer);
            this.active = null;
            finish();
        }

        try {
            return this.store.getRun(runId);
        } catch (e) {
            log.error(`Run ${runId} record unreadable`, e);
            return null;
        }
    }

    private close(runId: number, status: 'succeeded' | 'failed', progress: RunProgress): void {
        try {
            if (!this.store.finishRun(runId, status, progress.counts, progress.errors, this.now())) {
                log.warn(`Run ${runId} was already closed`);
            }
        } catch (e) {
            // Left "running" in storage; the stale-run reset picks it up
            log.error(`Run ${runId} could not be closed${isPipelineError(e) ? ` (${e.code})` : ''}`, e);
        }
    }
}
