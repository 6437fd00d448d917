import { beforeEach, describe, expect, it } from 'vitest';

import { createHealthRule } from '@alerts/healthIndex';
import { AlertStateMachine } from '@alerts/stateMachine';
import type { AlertOutcome } from '@lib/alerts';
import { createReading } from '@lib/readings';
import { fakeNotifier, virtualTime } from '../test/fakes';

const THRESHOLD = 100;
const COOLDOWN_MS = 30 * 60 * 1000;
const LOW = THRESHOLD - 1;
const HIGH = THRESHOLD + 50;

const reading = (health: number, endpoint: string = '/a') =>
  createReading(endpoint, new Date(0), { health });

describe('AlertStateMachine', () => {
  let time: ReturnType<typeof virtualTime>;
  let notifier: ReturnType<typeof fakeNotifier>;
  let machine: AlertStateMachine;

  const feed = async (
    values: number[],
    endpoint: string = '/a',
  ): Promise<AlertOutcome[]> => {
    const outcomes: AlertOutcome[] = [];
    for (const value of values) {
      const [evaluation] = await machine.evaluate(reading(value, endpoint));
      outcomes.push(evaluation.outcome);
    }
    return outcomes;
  };

  beforeEach(() => {
    time = virtualTime(1_000_000);
    notifier = fakeNotifier();
    machine = new AlertStateMachine(
      [
        createHealthRule({
          threshold: THRESHOLD,
          minConsecutivePolls: 3,
          cooldownMs: COOLDOWN_MS,
        }),
      ],
      notifier.sink,
      time.clock,
    );
  });

  it('stays quiet for fewer than the minimum low readings', async () => {
    expect(await feed([LOW, LOW])).toEqual(['none', 'none']);
    expect(notifier.send).not.toHaveBeenCalled();
    expect(machine.state('/a', 'health_low')).toEqual({
      consecutiveLow: 2,
      consecutiveHigh: 0,
      active: false,
    });
  });

  it('alerts once on the third consecutive low reading', async () => {
    expect(await feed([LOW, LOW, LOW])).toEqual([
      'none',
      'none',
      'alert_sent',
    ]);
    expect(notifier.send).toHaveBeenCalledTimes(1);
    expect(notifier.send.mock.calls[0][0]).toBe(
      [
        '🚨 *Air quality warning*',
        '',
        '*Sensor:* `/a`',
        '*Health index:* 99/1000',
        '*Threshold:* 100',
        '',
        'Air quality dropped below the critical level.',
      ].join('\n'),
    );
    expect(machine.state('/a', 'health_low')).toEqual({
      consecutiveLow: 3,
      consecutiveHigh: 0,
      active: true,
      lastNotifiedAt: 1_000_000,
    });
  });

  it('suppresses repeats within the cooldown while counting on', async () => {
    await feed([LOW, LOW, LOW]);
    time.advance(COOLDOWN_MS - 1);

    expect(await feed([LOW, LOW])).toEqual([
      'alert_suppressed',
      'alert_suppressed',
    ]);
    expect(notifier.send).toHaveBeenCalledTimes(1);
    expect(machine.state('/a', 'health_low')?.consecutiveLow).toBe(5);
  });

  it('alerts again once the cooldown has passed', async () => {
    await feed([LOW, LOW, LOW]);
    time.advance(COOLDOWN_MS);

    expect(await feed([LOW])).toEqual(['alert_sent']);
    expect(notifier.send).toHaveBeenCalledTimes(2);
    expect(machine.state('/a', 'health_low')?.lastNotifiedAt).toBe(
      1_000_000 + COOLDOWN_MS,
    );
  });

  it('recovers after the minimum high readings', async () => {
    await feed([LOW, LOW, LOW]);
    time.advance(60_000);

    expect(await feed([HIGH, HIGH, HIGH, HIGH])).toEqual([
      'none',
      'none',
      'recovery_sent',
      'none',
    ]);
    expect(notifier.send).toHaveBeenCalledTimes(2);
    expect(notifier.send.mock.calls[1][0]).toContain(
      '✅ *All clear: air quality recovered*',
    );
    expect(machine.state('/a', 'health_low')).toMatchObject({
      consecutiveLow: 0,
      consecutiveHigh: 4,
      active: false,
    });
  });

  it('resets the low count on a single high reading without recovering', async () => {
    await feed([LOW, LOW, LOW]);

    expect(await feed([HIGH])).toEqual(['none']);
    expect(machine.state('/a', 'health_low')).toMatchObject({
      consecutiveLow: 0,
      consecutiveHigh: 1,
      active: true,
    });

    expect(await feed([LOW])).toEqual(['none']);
    expect(machine.state('/a', 'health_low')).toMatchObject({
      consecutiveLow: 1,
      consecutiveHigh: 0,
      active: true,
    });
  });

  it('treats a reading at the threshold as healthy', async () => {
    expect(await feed([THRESHOLD, THRESHOLD, THRESHOLD])).toEqual([
      'none',
      'none',
      'none',
    ]);
    expect(machine.state('/a', 'health_low')?.consecutiveHigh).toBe(3);
  });

  it('never sends a recovery without an active alert', async () => {
    await feed([HIGH, HIGH, HIGH, HIGH]);
    expect(notifier.send).not.toHaveBeenCalled();
  });

  it('keeps counters and retries the alert after a failed send', async () => {
    notifier.send.mockResolvedValueOnce(false);

    expect(await feed([LOW, LOW, LOW])).toEqual([
      'none',
      'none',
      'alert_failed',
    ]);
    expect(machine.state('/a', 'health_low')).toEqual({
      consecutiveLow: 3,
      consecutiveHigh: 0,
      active: false,
    });

    expect(await feed([LOW])).toEqual(['alert_sent']);
    expect(notifier.send).toHaveBeenCalledTimes(2);
    expect(machine.state('/a', 'health_low')?.active).toBe(true);
  });

  it('treats a throwing sink as a failed send', async () => {
    notifier.send.mockRejectedValueOnce(new Error('socket hang up'));

    expect(await feed([LOW, LOW, LOW])).toEqual([
      'none',
      'none',
      'alert_failed',
    ]);
    expect(machine.state('/a', 'health_low')?.active).toBe(false);
  });

  it('stays active until a recovery gets through', async () => {
    await feed([LOW, LOW, LOW]);
    notifier.send.mockResolvedValueOnce(false);

    expect(await feed([HIGH, HIGH, HIGH, HIGH])).toEqual([
      'none',
      'none',
      'recovery_failed',
      'recovery_sent',
    ]);
    expect(machine.state('/a', 'health_low')?.active).toBe(false);
  });

  it('does not hold recoveries back by the cooldown', async () => {
    await feed([LOW, LOW, LOW]);
    time.advance(1000);

    expect(await feed([HIGH, HIGH, HIGH])).toEqual([
      'none',
      'none',
      'recovery_sent',
    ]);
  });

  it('keeps at most one counter above zero', async () => {
    for (const value of [LOW, HIGH, HIGH, LOW, LOW, HIGH, LOW]) {
      const [evaluation] = await machine.evaluate(reading(value));
      const { consecutiveLow, consecutiveHigh } = evaluation.state;
      expect(Math.min(consecutiveLow, consecutiveHigh)).toBe(0);
    }
  });

  it('keeps sensors apart', async () => {
    await feed([LOW, LOW], '/a');
    await feed([LOW], '/b');

    expect(machine.state('/a', 'health_low')?.consecutiveLow).toBe(2);
    expect(machine.state('/b', 'health_low')?.consecutiveLow).toBe(1);
    expect(notifier.send).not.toHaveBeenCalled();
  });

  it('skips readings without the metric', async () => {
    const evaluations = await machine.evaluate(
      createReading('/a', new Date(0), { co2: [420, 10] }),
    );

    expect(evaluations).toEqual([]);
    expect(machine.state('/a', 'health_low')).toBeUndefined();
  });

  it('reads the value of a [value, uncertainty] pair', async () => {
    const [evaluation] = await machine.evaluate(
      createReading('/a', new Date(0), { health: [42, 5] }),
    );

    expect(evaluation.value).toBe(42);
    expect(evaluation.state.consecutiveLow).toBe(1);
  });

  describe('cleanup', () => {
    it('drops state of sensors that are no longer configured', async () => {
      await feed([LOW], '/a');
      await feed([LOW], '/b');

      expect(machine.cleanup(['/a'])).toEqual({ removed: 1, expired: 0 });
      expect(machine.state('/b', 'health_low')).toBeUndefined();
      expect(Object.keys(machine.snapshot())).toEqual(['/a:health_low']);
    });

    it('forgets notification times older than twice the cooldown', async () => {
      await feed([LOW, LOW, LOW]);

      time.advance(2 * COOLDOWN_MS);
      expect(machine.cleanup(['/a'])).toEqual({ removed: 0, expired: 0 });
      expect(machine.state('/a', 'health_low')?.lastNotifiedAt).toBe(
        1_000_000,
      );

      time.advance(1);
      expect(machine.cleanup(['/a'])).toEqual({ removed: 0, expired: 1 });
      expect(machine.state('/a', 'health_low')).toEqual({
        consecutiveLow: 3,
        consecutiveHigh: 0,
        active: true,
      });
    });
  });
});
