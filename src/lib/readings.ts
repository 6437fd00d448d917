export type SensorPayload = Record<string, unknown>;

export type Measurement = {
  value: number;
  uncertainty?: number;
};

export type Reading = {
  endpoint: string;
  collectedAt: Date;
  fields: SensorPayload;
  measurements: Record<string, Measurement>;
};

function isFiniteNumber(value: unknown): value is number {
  return 'number' === typeof value && Number.isFinite(value);
}

export function isPayload(value: unknown): value is SensorPayload {
  return 'object' === typeof value && null !== value && !Array.isArray(value);
}

/**
 * Sensors report either a bare number or a `[value, uncertainty]` pair.
 * Every other shape is treated as absent.
 */
export function toMeasurement(raw: unknown): Measurement | undefined {
  if (isFiniteNumber(raw)) {
    return { value: raw };
  }
  if (Array.isArray(raw)) {
    const [value, uncertainty]: unknown[] = raw;
    if (!isFiniteNumber(value)) {
      return undefined;
    }
    return isFiniteNumber(uncertainty) ? { value, uncertainty } : { value };
  }
  return undefined;
}

export function createReading(
  endpoint: string,
  collectedAt: Date,
  fields: SensorPayload,
): Reading {
  const measurements: Record<string, Measurement> = {};
  for (const [name, raw] of Object.entries(fields)) {
    const measurement = toMeasurement(raw);
    if (measurement) {
      measurements[name] = measurement;
    }
  }
  return { endpoint, collectedAt, fields, measurements };
}

export function measurementValue(
  reading: Reading,
  metric: string,
): number | undefined {
  return reading.measurements[metric]?.value;
}
