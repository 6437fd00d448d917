import { createHealthRule } from '@alerts/healthIndex';
import { AlertStateMachine, type Clock } from '@alerts/stateMachine';
import type { AlertKey, AlertState } from '@lib/alerts';
import { createCipherCodec } from '@lib/cipher';
import type { Config } from '@lib/config';
import type { NotificationSink, PersistenceSink } from '@lib/sinks';
import { createSensorClient, type SensorClient } from '@sensors/client';
import { Poller, type PollerStatus, type Sleep } from '@sensors/poller';
import type { PrometheusSink } from '@sinks/prometheus';

export type MonitorDeps = {
  persistence: PersistenceSink;
  metrics: PrometheusSink;
  notifier: NotificationSink;
  client?: SensorClient;
  clock?: Clock;
  sleep?: Sleep;
};

export type MonitorStatus = PollerStatus & {
  notifications: boolean;
  alerts: Record<AlertKey, AlertState>;
};

/**
 * Everything one process needs to poll its sensors: configuration, the
 * alert state and the sinks, wired once and handed to the HTTP layer.
 */
export class Monitor {
  readonly alerts: AlertStateMachine;

  readonly poller: Poller;

  readonly metrics: PrometheusSink;

  private readonly notifier: NotificationSink;

  constructor(readonly config: Config, deps: MonitorDeps) {
    this.metrics = deps.metrics;
    this.notifier = deps.notifier;
    this.alerts = new AlertStateMachine(
      [
        createHealthRule({
          threshold: config.healthAlertThreshold,
          minConsecutivePolls: config.minConsecutivePolls,
          cooldownMs: config.alertCooldownMs,
        }),
      ],
      deps.notifier,
      deps.clock,
    );
    this.poller = new Poller({
      sensors: config.sensors,
      intervalMs: config.pollIntervalMs,
      client: deps.client ?? createSensorClient(config.host),
      codec: createCipherCodec(config.password),
      persistence: deps.persistence,
      metrics: deps.metrics,
      alerts: this.alerts,
      clock: deps.clock,
      sleep: deps.sleep,
    });
  }

  start(): void {
    this.poller.start();
  }

  stop(): Promise<void> {
    return this.poller.stop();
  }

  status(): MonitorStatus {
    return {
      ...this.poller.status(),
      notifications: this.notifier.enabled,
      alerts: this.alerts.snapshot(),
    };
  }
}
