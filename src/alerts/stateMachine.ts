import {
  alertKey,
  type AlertEvaluation,
  type AlertKey,
  type AlertOutcome,
  type AlertRule,
  type AlertState,
  type AlertType,
} from '@lib/alerts';
import { errorMessage } from '@lib/errors';
import { alertLogger } from '@lib/logger';
import { measurementValue, type Reading } from '@lib/readings';
import type { NotificationSink } from '@lib/sinks';

export type Clock = () => number;

type AlertEntry = {
  endpoint: string;
  rule: AlertRule;
  state: AlertState;
};

export type CleanupReport = {
  removed: number;
  expired: number;
};

/**
 * Hysteresis per (endpoint, alert type): a rule fires after
 * `minConsecutivePolls` readings below its threshold and clears after as
 * many readings at or above it. Repeated alerts are rate limited by the
 * rule's cooldown; recoveries are not.
 */
export class AlertStateMachine {
  private readonly entries: Map<AlertKey, AlertEntry> = new Map();

  constructor(
    private readonly rules: AlertRule[],
    private readonly notifier: NotificationSink,
    private readonly clock: Clock = Date.now,
  ) {}

  async evaluate(reading: Reading): Promise<AlertEvaluation[]> {
    const evaluations: AlertEvaluation[] = [];
    for (const rule of this.rules) {
      const value: number | undefined = measurementValue(reading, rule.metric);
      if (undefined === value) {
        alertLogger.debug(
          { endpoint: reading.endpoint, metric: rule.metric },
          'Metric missing from reading',
        );
        continue;
      }
      evaluations.push(await this.apply(rule, reading.endpoint, value));
    }
    return evaluations;
  }

  state(endpoint: string, type: AlertType): AlertState | undefined {
    const entry = this.entries.get(alertKey(endpoint, type));
    return entry ? { ...entry.state } : undefined;
  }

  snapshot(): Record<AlertKey, AlertState> {
    return Object.fromEntries(
      [...this.entries].map(([key, entry]) => [key, { ...entry.state }]),
    );
  }

  cleanup(configuredEndpoints: Iterable<string>): CleanupReport {
    const configured: Set<string> = new Set(configuredEndpoints);
    const now: number = this.clock();
    const report: CleanupReport = { removed: 0, expired: 0 };
    for (const [key, { endpoint, rule, state }] of this.entries) {
      if (!configured.has(endpoint)) {
        this.entries.delete(key);
        ++report.removed;
      } else if (
        undefined !== state.lastNotifiedAt &&
        2 * rule.cooldownMs < now - state.lastNotifiedAt
      ) {
        delete state.lastNotifiedAt;
        ++report.expired;
      }
    }
    if (0 < report.removed || 0 < report.expired) {
      alertLogger.info(report, 'Alert state cleaned up');
    }
    return report;
  }

  private entryFor(endpoint: string, rule: AlertRule): AlertEntry {
    const key: AlertKey = alertKey(endpoint, rule.type);
    let entry = this.entries.get(key);
    if (!entry) {
      entry = {
        endpoint,
        rule,
        state: { consecutiveLow: 0, consecutiveHigh: 0, active: false },
      };
      this.entries.set(key, entry);
    }
    return entry;
  }

  private inCooldown(rule: AlertRule, state: AlertState): boolean {
    return (
      undefined !== state.lastNotifiedAt &&
      this.clock() - state.lastNotifiedAt < rule.cooldownMs
    );
  }

  private async apply(
    rule: AlertRule,
    endpoint: string,
    value: number,
  ): Promise<AlertEvaluation> {
    const { state } = this.entryFor(endpoint, rule);
    let outcome: AlertOutcome = 'none';

    if (value < rule.threshold) {
      state.consecutiveHigh = 0;
      ++state.consecutiveLow;
      if (rule.minConsecutivePolls <= state.consecutiveLow) {
        if (this.inCooldown(rule, state)) {
          outcome = 'alert_suppressed';
          alertLogger.debug({ endpoint, type: rule.type }, 'Alert in cooldown');
        } else if (
          await this.notify(rule.formatAlert(endpoint, value, rule.threshold))
        ) {
          outcome = 'alert_sent';
          state.active = true;
          state.lastNotifiedAt = this.clock();
          alertLogger.warn(
            { endpoint, type: rule.type, value },
            'Alert notification sent',
          );
        } else {
          outcome = 'alert_failed';
        }
      }
    } else {
      state.consecutiveLow = 0;
      ++state.consecutiveHigh;
      if (rule.minConsecutivePolls <= state.consecutiveHigh && state.active) {
        if (
          await this.notify(
            rule.formatRecovery(endpoint, value, rule.threshold),
          )
        ) {
          outcome = 'recovery_sent';
          state.active = false;
          alertLogger.info(
            { endpoint, type: rule.type, value },
            'Recovery notification sent',
          );
        } else {
          outcome = 'recovery_failed';
        }
      }
    }

    return {
      key: alertKey(endpoint, rule.type),
      value,
      outcome,
      state: { ...state },
    };
  }

  private async notify(text: string): Promise<boolean> {
    try {
      return await this.notifier.send(text);
    } catch (e) {
      alertLogger.error({ err: errorMessage(e) }, 'Notification sink threw');
      return false;
    }
  }
}
