import { Counter, Gauge, Histogram, Registry } from 'prom-client';

import type { CycleResult } from '@lib/cycle';
import { measurementValue, type Reading } from '@lib/readings';
import type { MetricsSink } from '@lib/sinks';

type GaugeSpec = {
  field: string;
  name: string;
  help: string;
};

const GAUGES: GaugeSpec[] = [
  {
    field: 'temperature',
    name: 'sensor_temperature_celsius',
    help: 'Temperature in degrees Celsius',
  },
  {
    field: 'humidity',
    name: 'sensor_humidity_percent',
    help: 'Relative humidity in percent',
  },
  {
    field: 'co2',
    name: 'sensor_co2_ppm',
    help: 'CO2 concentration in ppm',
  },
  {
    field: 'pressure',
    name: 'sensor_pressure_hpa',
    help: 'Air pressure in hPa',
  },
  {
    field: 'no2',
    name: 'sensor_no2_ppm',
    help: 'NO2 concentration in ppm',
  },
  {
    field: 'tvoc',
    name: 'sensor_tvoc_ppb',
    help: 'TVOC concentration in ppb',
  },
  {
    field: 'pm2_5',
    name: 'sensor_pm25_ugm3',
    help: 'PM2.5 particulate matter in µg/m³',
  },
  {
    field: 'pm10',
    name: 'sensor_pm10_ugm3',
    help: 'PM10 particulate matter in µg/m³',
  },
  {
    field: 'sound',
    name: 'sensor_sound_db',
    help: 'Noise level in dB',
  },
  {
    field: 'health',
    name: 'sensor_health_index',
    help: 'Health index from 0 to 1000',
  },
];

export class PrometheusSink implements MetricsSink {
  readonly registry: Registry;

  private readonly gauges: Map<string, Gauge<'sensor_path'>> = new Map();

  private readonly readings: Counter<'sensor_path'>;

  private readonly failures: Counter<'sensor_path' | 'kind'>;

  private readonly cycleDuration: Histogram;

  constructor(registry: Registry = new Registry()) {
    this.registry = registry;
    for (const spec of GAUGES) {
      this.gauges.set(
        spec.field,
        new Gauge({
          name: spec.name,
          help: spec.help,
          labelNames: ['sensor_path'],
          registers: [registry],
        }),
      );
    }
    this.readings = new Counter({
      name: 'sensor_readings_total',
      help: 'Number of processed sensor readings',
      labelNames: ['sensor_path'],
      registers: [registry],
    });
    this.failures = new Counter({
      name: 'sensor_poll_failures_total',
      help: 'Number of sensors that failed a poll cycle',
      labelNames: ['sensor_path', 'kind'],
      registers: [registry],
    });
    this.cycleDuration = new Histogram({
      name: 'sensor_poll_cycle_duration_seconds',
      help: 'Duration of a full poll cycle in seconds',
      buckets: [0.1, 0.5, 1, 2.5, 5, 10, 20, 30, 60],
      registers: [registry],
    });
  }

  observe(endpoint: string, reading: Reading): void {
    this.readings.labels(endpoint).inc();
    for (const [field, gauge] of this.gauges) {
      const value = measurementValue(reading, field);
      if (undefined !== value) {
        gauge.labels(endpoint).set(value);
      }
    }
  }

  observeFailure(endpoint: string, kind: string): void {
    this.failures.labels(endpoint, kind).inc();
  }

  observeCycle(result: CycleResult): void {
    this.cycleDuration.observe(result.durationMs / 1000);
  }

  metrics(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }
}
