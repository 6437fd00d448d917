import type { AlertStateMachine, Clock } from '@alerts/stateMachine';
import type { CipherCodec } from '@lib/cipher';
import {
  summarize,
  type CycleResult,
  type CycleSummary,
  type EndpointOutcome,
  type PollPhase,
} from '@lib/cycle';
import {
  describeError,
  errorKind,
  errorMessage,
  isRetryable,
  unexpectedError,
  type FetchError,
  type SensorError,
} from '@lib/errors';
import { pollerLogger } from '@lib/logger';
import { createReading, type Reading } from '@lib/readings';
import { err, ok, type Result } from '@lib/result';
import type { MetricsSink, PersistenceSink } from '@lib/sinks';
import { LimitedQueue, sleep, toSeconds } from '@lib/utils';
import type { SensorClient } from '@sensors/client';

export const MAX_RETRIES = 3;
export const RETRY_DELAY_MS = 5_000;
export const CLEANUP_EVERY_CYCLES = 100;
const HISTORY_LENGTH = 10;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type PollerOptions = {
  sensors: string[];
  intervalMs: number;
  client: SensorClient;
  codec: CipherCodec;
  persistence: PersistenceSink;
  metrics: MetricsSink;
  alerts: AlertStateMachine;
  clock?: Clock;
  sleep?: Sleep;
};

export type OutcomeSummary = {
  at: number;
  status: EndpointOutcome['status'];
  attempts: number;
  elapsedMs: number;
  error?: string;
};

type SensorReport = {
  lastSuccess?: number;
  failingSince?: number;
  outcomes: LimitedQueue<OutcomeSummary>;
};

export type SensorStatus = Omit<SensorReport, 'outcomes'> & {
  outcomes: OutcomeSummary[];
};

export type PollerStatus = {
  phase: PollPhase;
  running: boolean;
  cycles: CycleSummary[];
  sensors: Record<string, SensorStatus>;
};

/** Delay before the next cycle; zero once a cycle overran the interval. */
export function nextDelay(intervalMs: number, durationMs: number): number {
  return Math.max(0, intervalMs - durationMs);
}

export class Poller {
  private phase: PollPhase = 'idle';

  private cycle: number = 0;

  private controller?: AbortController;

  private loop?: Promise<void>;

  private readonly history: LimitedQueue<CycleSummary> = new LimitedQueue(
    HISTORY_LENGTH,
  );

  private readonly reports: Map<string, SensorReport> = new Map();

  private readonly sensors: string[];

  private readonly clock: Clock;

  private readonly sleep: Sleep;

  constructor(private readonly options: PollerOptions) {
    this.sensors = [...new Set(options.sensors)];
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? sleep;
    for (const sensor of this.sensors) {
      this.reports.set(sensor, {
        outcomes: new LimitedQueue<OutcomeSummary>(HISTORY_LENGTH),
      });
    }
  }

  get running(): boolean {
    return undefined !== this.loop;
  }

  start(): void {
    if (this.loop) {
      pollerLogger.warn('Polling is already running');
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal).finally(() => {
      this.loop = undefined;
    });
  }

  async stop(): Promise<void> {
    if (!this.loop) return;
    this.controller?.abort();
    await this.loop;
    pollerLogger.info('Polling stopped');
  }

  status(): PollerStatus {
    return {
      phase: this.phase,
      running: this.running,
      cycles: this.history.toArray(),
      sensors: Object.fromEntries(
        [...this.reports].map(([sensor, report]) => [
          sensor,
          { ...report, outcomes: report.outcomes.toArray() },
        ]),
      ),
    };
  }

  async runCycle(signal?: AbortSignal): Promise<CycleResult> {
    const cycle: number = ++this.cycle;
    const startedAt: number = this.clock();

    this.phase = 'dispatching';
    const pending: Promise<EndpointOutcome>[] = this.sensors.map(
      (sensor) => this.pollSensor(sensor, signal),
    );

    this.phase = 'awaiting';
    const outcomes: EndpointOutcome[] = await Promise.all(pending);

    this.phase = 'reporting';
    const successful: number = outcomes.filter(
      (o) => 'success' === o.status,
    ).length;
    const result: CycleResult = {
      cycle,
      startedAt,
      durationMs: this.clock() - startedAt,
      outcomes,
      successful,
      failed: outcomes.length - successful,
    };
    this.report(result);
    if (0 === cycle % CLEANUP_EVERY_CYCLES) {
      this.options.alerts.cleanup(this.sensors);
    }
    this.phase = 'idle';
    return result;
  }

  private async run(signal: AbortSignal): Promise<void> {
    const { intervalMs } = this.options;
    pollerLogger.info(
      { sensors: this.sensors.length, intervalMs },
      'Sensor polling started',
    );
    try {
      while (!signal.aborted) {
        let durationMs: number;
        try {
          durationMs = (await this.runCycle(signal)).durationMs;
        } catch (e) {
          pollerLogger.error({ err: errorMessage(e) }, 'Poll cycle failed');
          durationMs = 0;
        }
        if (signal.aborted) break;

        const delay: number = nextDelay(intervalMs, durationMs);
        if (0 === delay) {
          pollerLogger.warn(
            { durationMs, intervalMs },
            `Poll cycle took ${toSeconds(durationMs)}s, longer than the interval`,
          );
          continue;
        }
        this.phase = 'sleeping';
        await this.sleep(delay, signal);
      }
    } finally {
      this.phase = 'idle';
      pollerLogger.info('Sensor polling ended');
    }
  }

  private async fetchReading(
    sensor: string,
  ): Promise<Result<Reading, FetchError>> {
    const envelope = await this.options.client.fetchEnvelope(sensor);
    if (!envelope.ok) return envelope;
    const payload = this.options.codec.decode(envelope.value);
    if (!payload.ok) return payload;
    return ok(createReading(sensor, new Date(this.clock()), payload.value));
  }

  private async fetchWithRetry(
    sensor: string,
    counter: { attempts: number },
    signal?: AbortSignal,
  ): Promise<Result<Reading, FetchError>> {
    for (;;) {
      ++counter.attempts;
      const result = await this.fetchReading(sensor);
      if (result.ok) return result;

      const { error } = result;
      if (
        !isRetryable(error) ||
        MAX_RETRIES < counter.attempts ||
        signal?.aborted
      ) {
        pollerLogger.error(
          { sensor, attempts: counter.attempts, kind: error.kind },
          `Sensor ${sensor} unreachable after ${counter.attempts} attempts: ${describeError(error)}`,
        );
        return result;
      }
      pollerLogger.warn(
        { sensor, kind: error.kind },
        `Error on ${sensor} (attempt ${counter.attempts}/${MAX_RETRIES}): ${describeError(error)}`,
      );
      await this.sleep(RETRY_DELAY_MS, signal);
      if (signal?.aborted) return result;
    }
  }

  private async pollSensor(
    sensor: string,
    signal?: AbortSignal,
  ): Promise<EndpointOutcome> {
    const startedAt: number = this.clock();
    const counter = { attempts: 0 };

    let result: Result<Reading, SensorError>;
    try {
      result = await this.fetchWithRetry(sensor, counter, signal);
    } catch (e) {
      pollerLogger.error(
        { sensor, err: errorMessage(e) },
        'Unexpected error while polling',
      );
      result = err(unexpectedError(e));
    }

    if (result.ok) {
      await this.handle(result.value);
    } else {
      this.observeFailure(sensor, result.error);
    }

    const base = {
      endpoint: sensor,
      attempts: counter.attempts,
      elapsedMs: this.clock() - startedAt,
    };
    return result.ok
      ? { ...base, status: 'success', reading: result.value }
      : { ...base, status: 'failed', error: result.error };
  }

  private async handle(reading: Reading): Promise<void> {
    const { endpoint } = reading;
    try {
      const stored = await this.options.persistence.append(
        endpoint,
        reading.collectedAt,
        reading.fields,
      );
      if (!stored.ok) {
        pollerLogger.error(
          { sensor: endpoint, err: describeError(stored.error) },
          'Reading dropped, storing failed',
        );
      }
    } catch (e) {
      pollerLogger.error(
        { sensor: endpoint, err: errorMessage(e) },
        'Reading dropped, storing failed',
      );
    }

    try {
      this.options.metrics.observe(endpoint, reading);
    } catch (e) {
      pollerLogger.warn(
        { sensor: endpoint, err: errorMessage(e) },
        'Metrics update failed',
      );
    }

    try {
      await this.options.alerts.evaluate(reading);
    } catch (e) {
      pollerLogger.error(
        { sensor: endpoint, err: errorMessage(e) },
        'Alert evaluation failed',
      );
    }
    pollerLogger.debug({ sensor: endpoint }, 'Sensor polled');
  }

  private observeFailure(sensor: string, error: SensorError): void {
    try {
      this.options.metrics.observeFailure(sensor, errorKind(error));
    } catch (e) {
      pollerLogger.warn(
        { sensor, err: errorMessage(e) },
        'Metrics update failed',
      );
    }
  }

  private report(result: CycleResult): void {
    const now: number = this.clock();
    for (const outcome of result.outcomes) {
      this.track(outcome, now);
    }
    this.history.enqueue(summarize(result));
    try {
      this.options.metrics.observeCycle(result);
    } catch (e) {
      pollerLogger.warn({ err: errorMessage(e) }, 'Metrics update failed');
    }
    const total: number = result.outcomes.length;
    pollerLogger.info(
      {
        cycle: result.cycle,
        successful: result.successful,
        total,
        durationMs: result.durationMs,
      },
      `${result.successful}/${total} sensors successful in ${toSeconds(result.durationMs)}s`,
    );
  }

  private track(outcome: EndpointOutcome, at: number): void {
    let report = this.reports.get(outcome.endpoint);
    if (!report) {
      report = { outcomes: new LimitedQueue<OutcomeSummary>(HISTORY_LENGTH) };
      this.reports.set(outcome.endpoint, report);
    }
    const summary: OutcomeSummary = {
      at,
      status: outcome.status,
      attempts: outcome.attempts,
      elapsedMs: outcome.elapsedMs,
    };
    if ('success' === outcome.status) {
      report.lastSuccess = at;
      delete report.failingSince;
    } else {
      summary.error = describeError(outcome.error);
      report.failingSince ??= at;
    }
    report.outcomes.enqueue(summary);
  }
}
