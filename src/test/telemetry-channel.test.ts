import assert from 'node:assert/strict';
import { describe, it } from 'vitest';
import { TELEMETRY_CHANNEL_CAPACITY, TelemetryChannel } from '../telemetry-channel';
import { flush, isSettled } from './helpers';

const fill = async (channel: TelemetryChannel<number>, count: number) => {
  for (let value = 0; value < count; value++) {
    assert.equal(await channel.put(value), true);
  }
};

describe('telemetry-channel', () => {
  it('defaults to a capacity of five', () => {
    assert.equal(TELEMETRY_CHANNEL_CAPACITY, 5);
    assert.equal(new TelemetryChannel<number>().capacity, 5);
  });

  it('rejects capacities that are not positive integers', () => {
    assert.throws(() => new TelemetryChannel<number>(0), RangeError);
    assert.throws(() => new TelemetryChannel<number>(2.5), RangeError);
  });

  it('delivers values in the order they were put', async () => {
    const channel = new TelemetryChannel<number>();
    await fill(channel, 3);

    assert.deepEqual(await channel.get(), { done: false, value: 0 });
    assert.deepEqual(await channel.get(), { done: false, value: 1 });
    assert.deepEqual(await channel.get(), { done: false, value: 2 });
    assert.equal(channel.size, 0);
  });

  it('suspends a put on a full channel until one get completes', async () => {
    const channel = new TelemetryChannel<number>();
    await fill(channel, 5);

    const sixth = channel.put(5);
    const seventh = channel.put(6);

    assert.equal(await isSettled(sixth), false);
    assert.equal(channel.size, 5);
    assert.equal(channel.waitingProducers, 2);

    assert.deepEqual(await channel.get(), { done: false, value: 0 });

    assert.equal(await isSettled(sixth), true);
    assert.equal(await sixth, true);
    assert.equal(await isSettled(seventh), false);
    assert.equal(channel.size, 5);
    assert.equal(channel.waitingProducers, 1);
  });

  it('keeps order across suspended puts', async () => {
    const channel = new TelemetryChannel<number>();
    await fill(channel, 5);
    const pending = [channel.put(5), channel.put(6)];

    const received: number[] = [];
    for (let index = 0; index < 7; index++) {
      const result = await channel.get();
      assert.equal(result.done, false);
      if (!result.done) {
        received.push(result.value);
      }
    }

    assert.deepEqual(received, [0, 1, 2, 3, 4, 5, 6]);
    assert.deepEqual(await Promise.all(pending), [true, true]);
  });

  it('hands a value straight to a waiting get', async () => {
    const channel = new TelemetryChannel<number>();
    const next = channel.get();

    assert.equal(await isSettled(next), false);
    assert.equal(await channel.put(42), true);

    assert.deepEqual(await next, { done: false, value: 42 });
    assert.equal(channel.size, 0);
  });

  it('cancels a suspended put without enqueuing its value', async () => {
    const channel = new TelemetryChannel<number>();
    await fill(channel, 5);
    const controller = new AbortController();

    const blocked = channel.put(99, controller.signal);
    controller.abort();

    assert.equal(await blocked, false);
    assert.equal(channel.waitingProducers, 0);
    assert.equal(channel.size, 5);

    const received: number[] = [];
    while (channel.size > 0) {
      const result = await channel.get();
      if (!result.done) {
        received.push(result.value);
      }
    }
    assert.deepEqual(received, [0, 1, 2, 3, 4]);
  });

  it('cancels a waiting get and keeps later values for the next consumer', async () => {
    const channel = new TelemetryChannel<number>();
    const controller = new AbortController();

    const cancelled = channel.get(controller.signal);
    controller.abort();
    assert.deepEqual(await cancelled, { done: true });

    await channel.put(7);
    assert.equal(channel.size, 1);
    assert.deepEqual(await channel.get(), { done: false, value: 7 });
  });

  it('resolves immediately for an already aborted signal', async () => {
    const channel = new TelemetryChannel<number>();
    await channel.put(1);
    const signal = AbortSignal.abort();

    assert.deepEqual(await channel.get(signal), { done: true });
    assert.equal(await channel.put(2, signal), false);
    assert.equal(channel.size, 1);
  });

  it('never buffers more than its capacity while a fast producer runs', async () => {
    const channel = new TelemetryChannel<number>();
    let highWater = 0;

    const producer = (async () => {
      for (let value = 0; value < 20; value++) {
        await channel.put(value);
        highWater = Math.max(highWater, channel.size);
      }
    })();

    const received: number[] = [];
    for (let index = 0; index < 20; index++) {
      await flush();
      const result = await channel.get();
      if (!result.done) {
        received.push(result.value);
      }
    }
    await producer;

    assert.deepEqual(received, Array.from({ length: 20 }, (_, value) => value));
    assert.equal(highWater, 5);
  });
});
