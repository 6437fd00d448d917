import { z } from 'zod';

import {
  errorMessage,
  transportError,
  type TransportError,
} from '@lib/errors';
import { err, ok, type Result } from '@lib/result';

export const FETCH_TIMEOUT_MS = 10_000;

const dataResponse = z.object({ content: z.string() });

export type SensorClient = {
  fetchEnvelope: (path: string) => Promise<Result<string, TransportError>>;
};

export function baseUrl(host: string): string {
  const trimmed: string = host.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

export function dataPath(path: string): string {
  const rooted: string = path.startsWith('/') ? path : `/${path}`;
  return rooted.endsWith('/') ? `${rooted}data/` : `${rooted}/data/`;
}

function connectionMessage(e: unknown): string {
  if (e instanceof Error && e.cause instanceof Error) {
    return `${e.message}: ${e.cause.message}`;
  }
  return errorMessage(e);
}

/**
 * One GET per call, bounded by `timeoutMs`. Calls share nothing, so a slow
 * sensor never holds up another.
 */
export function createSensorClient(
  host: string,
  timeoutMs: number = FETCH_TIMEOUT_MS,
): SensorClient {
  const base: string = baseUrl(host);

  return {
    async fetchEnvelope(path: string): Promise<Result<string, TransportError>> {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), timeoutMs);
      const failure = (e: unknown): Result<string, TransportError> =>
        err(
          controller.signal.aborted
            ? transportError('timeout', `No response within ${timeoutMs}ms`)
            : transportError('connection', connectionMessage(e)),
        );

      let res: Response;
      try {
        res = await fetch(`${base}${dataPath(path)}`, {
          headers: { accept: 'application/json' },
          signal: controller.signal,
        });
      } catch (e) {
        clearTimeout(timer);
        return failure(e);
      }

      try {
        if (!res.ok) {
          return err(
            transportError(
              'http_status',
              `HTTP ${res.status}: ${res.statusText}`,
              res.status,
            ),
          );
        }
        let body: unknown;
        try {
          body = await res.json();
        } catch (e) {
          return controller.signal.aborted
            ? failure(e)
            : err(transportError('invalid_body', errorMessage(e)));
        }
        const parsed = dataResponse.safeParse(body);
        if (!parsed.success) {
          return err(
            transportError('invalid_body', 'Response carries no content string'),
          );
        }
        return ok(parsed.data.content);
      } finally {
        clearTimeout(timer);
      }
    },
  };
}
