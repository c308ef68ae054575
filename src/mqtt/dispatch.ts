/**
 * MQTT Module - Dispatch Queue
 *
 * The hand-off between the client's socket callbacks and message handlers.
 * Producers only enqueue; one consumer loop drains in FIFO order and awaits
 * each job before starting the next.
 */

export type DispatchQueue<T> = {
  /** Returns false once the queue is closed. */
  enqueue(item: T): boolean;
  /** Resolves when nothing is pending or in flight. */
  idle(): Promise<void>;
  /** Discard pending jobs and wait for the one in flight. Returns the discarded count. */
  close(): Promise<number>;
  size(): number;
};

export function createDispatchQueue<T>(
  consume: (item: T) => Promise<void>,
  onError: (error: unknown, item: T) => void,
): DispatchQueue<T> {
  // Boxed so that falsy items are not mistaken for an empty queue
  const pending: Array<{ item: T }> = [];
  let draining: Promise<void> | null = null;
  let closed = false;

  async function drain(): Promise<void> {
    while (!closed) {
      const job = pending.shift();
      if (!job) return;
      try {
        await consume(job.item);
      } catch (error) {
        onError(error, job.item);
      }
    }
  }

  function start(): void {
    draining = Promise.resolve()
      .then(drain)
      .finally(() => {
        draining = null;
        if (!closed && pending.length > 0) start();
      });
  }

  return {
    enqueue(item) {
      if (closed) return false;
      pending.push({ item });
      if (!draining) start();
      return true;
    },

    async idle() {
      while (draining) {
        await draining;
      }
    },

    async close() {
      closed = true;
      const discarded = pending.length;
      pending.length = 0;
      while (draining) {
        await draining;
      }
      return discarded;
    },

    size: () => pending.length,
  };
}
