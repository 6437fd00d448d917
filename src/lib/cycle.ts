import type { SensorError } from '@lib/errors';
import type { Reading } from '@lib/readings';

export type PollPhase =
  | 'idle'
  | 'dispatching'
  | 'awaiting'
  | 'reporting'
  | 'sleeping';

type OutcomeBase = {
  endpoint: string;
  attempts: number;
  elapsedMs: number;
};

export type EndpointOutcome =
  | (OutcomeBase & { status: 'success'; reading: Reading })
  | (OutcomeBase & { status: 'failed'; error: SensorError });

export type CycleResult = {
  cycle: number;
  startedAt: number;
  durationMs: number;
  outcomes: EndpointOutcome[];
  successful: number;
  failed: number;
};

export type CycleSummary = Omit<CycleResult, 'outcomes'> & {
  total: number;
};

export function summarize(result: CycleResult): CycleSummary {
  const { outcomes, ...rest } = result;
  return { ...rest, total: outcomes.length };
}
