import type { AlertRule } from '@lib/alerts';

export const HEALTH_METRIC = 'health';
export const HEALTH_SCALE = 1000;

type HealthRuleOptions = {
  threshold: number;
  minConsecutivePolls: number;
  cooldownMs: number;
};

function formatAlert(
  endpoint: string,
  value: number,
  threshold: number,
): string {
  return [
    '🚨 *Air quality warning*',
    '',
    `*Sensor:* \`${endpoint}\``,
    `*Health index:* ${value.toFixed(0)}/${HEALTH_SCALE}`,
    `*Threshold:* ${threshold}`,
    '',
    'Air quality dropped below the critical level.',
  ].join('\n');
}

function formatRecovery(
  endpoint: string,
  value: number,
  threshold: number,
): string {
  return [
    '✅ *All clear: air quality recovered*',
    '',
    `*Sensor:* \`${endpoint}\``,
    `*Health index:* ${value.toFixed(0)}/${HEALTH_SCALE}`,
    `*Threshold:* ${threshold}`,
    '',
    'Air quality is back to normal.',
  ].join('\n');
}

export function createHealthRule(options: HealthRuleOptions): AlertRule {
  return {
    type: 'health_low',
    metric: HEALTH_METRIC,
    ...options,
    formatAlert,
    formatRecovery,
  };
}
