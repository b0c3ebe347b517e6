export const TELEMETRY_CHANNEL_CAPACITY = 5;

export type ChannelResult<T>
  = { done: false; value: T }
  | { done: true };

type PendingPut<T> = {
  value: T;
  resolve: (delivered: boolean) => void;
};

type PendingGet<T> = (result: ChannelResult<T>) => void;

/**
 * Bounded FIFO between one producer and one consumer.
 *
 * A full channel suspends `put()` until `get()` frees a slot. Aborting the
 * signal passed to either call resolves it with a cancelled result instead
 * of rejecting.
 */
export class TelemetryChannel<T> {
  private buffer: T[] = [];
  private pendingPuts: PendingPut<T>[] = [];
  private pendingGets: PendingGet<T>[] = [];

  constructor(readonly capacity: number = TELEMETRY_CHANNEL_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got: ${capacity}`);
    }
  }

  get size() {
    return this.buffer.length;
  }

  get waitingProducers() {
    return this.pendingPuts.length;
  }

  put(value: T, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) {
      return Promise.resolve(false);
    }

    const waitingGet = this.pendingGets.shift();
    if (waitingGet) {
      waitingGet({ done: false, value });
      return Promise.resolve(true);
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return Promise.resolve(true);
    }

    return new Promise(resolve => {
      const pending: PendingPut<T> = {
        value,
        resolve: delivered => {
          signal?.removeEventListener('abort', onAbort);
          resolve(delivered);
        },
      };
      const onAbort = () => {
        this.pendingPuts = this.pendingPuts.filter(candidate => candidate !== pending);
        pending.resolve(false);
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.pendingPuts.push(pending);
    });
  }

  get(signal?: AbortSignal): Promise<ChannelResult<T>> {
    if (signal?.aborted) {
      return Promise.resolve({ done: true });
    }

    if (this.buffer.length > 0) {
      const value = this.takeBuffered();
      return Promise.resolve({ done: false, value });
    }

    return new Promise(resolve => {
      const pending: PendingGet<T> = result => {
        signal?.removeEventListener('abort', onAbort);
        resolve(result);
      };
      const onAbort = () => {
        this.pendingGets = this.pendingGets.filter(candidate => candidate !== pending);
        pending({ done: true });
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.pendingGets.push(pending);
    });
  }

  private takeBuffered(): T {
    const [value, ...rest] = this.buffer;
    this.buffer = rest;

    const waitingPut = this.pendingPuts.shift();
    if (waitingPut) {
      this.buffer.push(waitingPut.value);
      waitingPut.resolve(true);
    }

    return value;
  }
}
