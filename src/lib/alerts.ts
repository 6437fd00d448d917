export type AlertType = 'health_low';

/** `${endpoint}:${alertType}` */
export type AlertKey = string;

export type AlertState = {
  consecutiveLow: number;
  consecutiveHigh: number;
  active: boolean;
  lastNotifiedAt?: number;
};

export type AlertRule = {
  type: AlertType;
  metric: string;
  threshold: number;
  minConsecutivePolls: number;
  cooldownMs: number;
  formatAlert: (endpoint: string, value: number, threshold: number) => string;
  formatRecovery: (
    endpoint: string,
    value: number,
    threshold: number,
  ) => string;
};

export type AlertOutcome =
  | 'none'
  | 'alert_sent'
  | 'alert_suppressed'
  | 'alert_failed'
  | 'recovery_sent'
  | 'recovery_failed';

export type AlertEvaluation = {
  key: AlertKey;
  value: number;
  outcome: AlertOutcome;
  state: AlertState;
};

export function alertKey(endpoint: string, type: AlertType): AlertKey {
  return `${endpoint}:${type}`;
}
