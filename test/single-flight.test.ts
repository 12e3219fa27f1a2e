import { describe, expect, test, vi } from 'vitest';
import { SingleFlight } from '../src/utils/single-flight.js';

describe('SingleFlight', () => {
  test('that concurrent callers share one computation', async () => {
    const flight = new SingleFlight<number>();
    const factory = vi.fn(async () => 42);

    const values = await Promise.all([flight.get(factory), flight.get(factory)]);

    expect(values).toEqual([42, 42]);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(flight.state).toBe('ready');
    expect(flight.peek()).toBe(42);
  });

  test('that a failed computation is retried by the next caller', async () => {
    const flight = new SingleFlight<number>();

    await expect(flight.get(async () => Promise.reject(new Error('failed')))).rejects.toThrow('failed');
    expect(flight.state).toBe('uninitialized');

    expect(await flight.get(async () => 7)).toBe(7);
  });

  test('that a reset during a computation discards its result', async () => {
    const flight = new SingleFlight<string>();
    let finish: (value: string) => void = () => undefined;
    const pending = flight.get(
      () =>
        new Promise<string>((resolve) => {
          finish = resolve;
        }),
    );

    flight.reset();
    finish('stale');

    expect(await pending).toBe('stale');
    expect(flight.state).toBe('uninitialized');
    expect(await flight.get(async () => 'fresh')).toBe('fresh');
  });
});
