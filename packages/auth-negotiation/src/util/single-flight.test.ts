import { describe, it, expect, vi } from 'vitest';
import { createSingleFlight } from './single-flight.js';

const deferred = <T>(): { promise: Promise<T>; resolve: (value: T) => void } => {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
};

describe('createSingleFlight', () => {
  it('run_ConcurrentCallers_ShareOneExecution', async () => {
    // Arrange
    const gate = createSingleFlight<string>();
    const pending = deferred<string>();
    const operation = vi.fn(() => pending.promise);

    // Act
    const first = gate.run(operation);
    const second = gate.run(operation);
    pending.resolve('token-a');

    // Assert
    expect(await first).toBe('token-a');
    expect(await second).toBe('token-a');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('run_AfterSettle_StartsNewExecution', async () => {
    // Arrange
    const gate = createSingleFlight<number>();
    const operation = vi.fn().mockResolvedValueOnce(1).mockResolvedValueOnce(2);

    // Act
    const first = await gate.run(operation);
    const second = await gate.run(operation);

    // Assert
    expect([first, second]).toEqual([1, 2]);
    expect(operation).toHaveBeenCalledTimes(2);
    expect(gate.isInFlight()).toBe(false);
  });

  it('run_OperationRejects_ReleasesGate', async () => {
    // Arrange
    const gate = createSingleFlight<number>();

    // Act
    await expect(gate.run(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');

    // Assert
    expect(gate.isInFlight()).toBe(false);
    expect(await gate.run(() => Promise.resolve(7))).toBe(7);
  });

  it('isInFlight_WhileRunning_ReturnsTrue', async () => {
    const gate = createSingleFlight<string>();
    const pending = deferred<string>();

    const running = gate.run(() => pending.promise);
    expect(gate.isInFlight()).toBe(true);

    pending.resolve('done');
    await running;
    expect(gate.isInFlight()).toBe(false);
  });
});
