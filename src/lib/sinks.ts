import type { PersistenceError } from '@lib/errors';
import type { CycleResult } from '@lib/cycle';
import type { Reading, SensorPayload } from '@lib/readings';
import type { Result } from '@lib/result';

export type PersistenceSink = {
  append: (
    endpoint: string,
    collectedAt: Date,
    fields: SensorPayload,
  ) => Promise<Result<void, PersistenceError>>;
};

/** Synchronous and best effort; callers never wait on metrics. */
export type MetricsSink = {
  observe: (endpoint: string, reading: Reading) => void;
  observeFailure: (endpoint: string, kind: string) => void;
  observeCycle: (result: CycleResult) => void;
};

export type NotificationSink = {
  readonly enabled: boolean;
  send: (text: string) => Promise<boolean>;
};
