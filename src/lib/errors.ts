export type TransportErrorKind =
  | 'timeout'
  | 'connection'
  | 'http_status'
  | 'invalid_body';

export type DecodeErrorKind =
  | 'malformed_base64'
  | 'cipher_failure'
  | 'invalid_padding'
  | 'invalid_json';

export type TransportError = {
  type: 'transport';
  kind: TransportErrorKind;
  message: string;
  status?: number;
};

export type DecodeError = {
  type: 'decode';
  kind: DecodeErrorKind;
  message: string;
};

export type PersistenceError = {
  type: 'persistence';
  message: string;
};

export type NotificationError = {
  type: 'notification';
  message: string;
  status?: number;
};

/** Anything thrown where no typed error was expected. */
export type UnexpectedError = {
  type: 'unexpected';
  message: string;
};

export type FetchError = TransportError | DecodeError;

export type SensorError = FetchError | UnexpectedError;

export function transportError(
  kind: TransportErrorKind,
  message: string,
  status?: number,
): TransportError {
  return status === undefined
    ? { type: 'transport', kind, message }
    : { type: 'transport', kind, message, status };
}

export function decodeError(
  kind: DecodeErrorKind,
  message: string,
): DecodeError {
  return { type: 'decode', kind, message };
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function unexpectedError(e: unknown): UnexpectedError {
  return { type: 'unexpected', message: errorMessage(e) };
}

export function errorKind(error: SensorError): string {
  return 'unexpected' === error.type ? 'unexpected' : error.kind;
}

export function describeError(
  error: SensorError | PersistenceError | NotificationError,
): string {
  switch (error.type) {
    case 'transport':
    case 'decode':
      return `${error.type}/${error.kind}: ${error.message}`;
    default:
      return `${error.type}: ${error.message}`;
  }
}

// Decode failures get the same backoff as transport failures.
export function isRetryable(error: SensorError): boolean {
  return 'transport' === error.type || 'decode' === error.type;
}
