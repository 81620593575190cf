/**
 * Per-market operation queue. Operations on the same market run one after
 * another; different markets proceed independently.
 */

interface QueuedOperation {
  id: string;
  run: () => Promise<void>;
  reject: (error: unknown) => void;
  timeout: NodeJS.Timeout;
}

class MarketQueue {
  private queues: Map<string, QueuedOperation[]> = new Map();
  private processing: Set<string> = new Set();
  private sequence = 0;

  /**
   * Add an operation to the queue for a market
   */
  async enqueue<T>(
    marketId: string,
    operation: () => Promise<T>,
    timeoutMs: number = 30000
  ): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const operationId = `${marketId}:${++this.sequence}`;

      const queued: QueuedOperation = {
        id: operationId,
        run: async () => {
          try {
            resolve(await operation());
          } catch (error) {
            reject(error);
          }
        },
        reject,
        timeout: setTimeout(() => {
          this.removeFromQueue(marketId, operationId);
          reject(
            new Error(`Market operation timed out after ${timeoutMs}ms`)
          );
        }, timeoutMs),
      };

      const queue = this.queues.get(marketId) || [];
      queue.push(queued);
      this.queues.set(marketId, queue);

      void this.processQueue(marketId);
    });
  }

  private async processQueue(marketId: string): Promise<void> {
    if (this.processing.has(marketId)) {
      return;
    }

    const queue = this.queues.get(marketId);
    if (!queue || queue.length === 0) {
      return;
    }

    this.processing.add(marketId);

    try {
      let next = queue.shift();
      while (next) {
        clearTimeout(next.timeout);
        await next.run();
        next = queue.shift();
      }
    } finally {
      this.processing.delete(marketId);
      if (queue.length === 0 && this.queues.get(marketId) === queue) {
        this.queues.delete(marketId);
      }
    }

    // A timeout may have swapped in a new array while this one ran
    const pending = this.queues.get(marketId);
    if (pending && pending.length > 0) {
      await this.processQueue(marketId);
    }
  }

  private removeFromQueue(marketId: string, operationId: string): void {
    const queue = this.queues.get(marketId);
    if (!queue) return;

    const index = queue.findIndex((op) => op.id === operationId);
    if (index >= 0) {
      const [removed] = queue.splice(index, 1);
      clearTimeout(removed.timeout);
    }
    if (queue.length === 0) {
      this.queues.delete(marketId);
    }
  }

  /**
   * Get queue status for monitoring/debugging
   */
  getQueueStatus(): Record<string, { queueLength: number; isProcessing: boolean }> {
    const status: Record<
      string,
      { queueLength: number; isProcessing: boolean }
    > = {};

    for (const [key, queue] of this.queues.entries()) {
      status[key] = {
        queueLength: queue.length,
        isProcessing: this.processing.has(key),
      };
    }

    return status;
  }

  /**
   * Reject everything still waiting (shutdown/tests)
   */
  clear(): void {
    for (const queue of this.queues.values()) {
      for (const op of queue) {
        clearTimeout(op.timeout);
        op.reject(new Error("Market queue cleared"));
      }
    }
    this.queues.clear();
    this.processing.clear();
  }
}

export const marketQueue = new MarketQueue();

export async function withMarketQueue<T>(
  marketId: string,
  operation: () => Promise<T>,
  timeoutMs?: number
): Promise<T> {
  return marketQueue.enqueue(marketId, operation, timeoutMs);
}
