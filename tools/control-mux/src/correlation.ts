import { ControlRequestError, TimeoutError } from './errors.js';
import type { Envelope } from './protocol-types.js';

/**
 * Per-session source of outbound request ids: req_1, req_2, ...
 * Never repeats within one allocator.
 */
export class RequestIdAllocator {
  private counter = 0;

  next(): string {
    this.counter += 1;
    return `req_${this.counter}`;
  }

  /** Number of ids handed out so far. */
  get issued(): number {
    return this.counter;
  }
}

interface PendingSlot {
  subtype: string;
  resolve: (response: Envelope) => void;
  reject: (error: Error) => void;
  timer?: ReturnType<typeof setTimeout>;
}

/**
 * Outbound requests awaiting a correlated control_response.
 *
 * A slot is registered before the request is written so a fast reply can
 * never arrive ahead of its waiter. Every slot settles exactly once: by
 * response, by timeout, or by rejectAll on session teardown.
 */
export class PendingRequests {
  private readonly slots = new Map<string, PendingSlot>();

  get size(): number {
    return this.slots.size;
  }

  has(requestId: string): boolean {
    return this.slots.has(requestId);
  }

  register(requestId: string, subtype: string, timeoutMs?: number): Promise<Envelope> {
    if (this.slots.has(requestId)) {
      return Promise.reject(new Error(`request id already pending: ${requestId}`));
    }

    return new Promise<Envelope>((resolve, reject) => {
      const slot: PendingSlot = { subtype, resolve, reject };

      if (timeoutMs !== undefined && timeoutMs > 0) {
        slot.timer = setTimeout(() => {
          this.slots.delete(requestId);
          reject(new TimeoutError(subtype, timeoutMs));
        }, timeoutMs);
      }

      this.slots.set(requestId, slot);
    });
  }

  /** Settle a slot with success. Returns false when no slot matched. */
  resolve(requestId: string, response: Envelope): boolean {
    const slot = this.take(requestId);
    if (!slot) return false;
    slot.resolve(response);
    return true;
  }

  /** Settle a slot with the far side's error text. Returns false when no slot matched. */
  fail(requestId: string, message: string): boolean {
    const slot = this.take(requestId);
    if (!slot) return false;
    slot.reject(new ControlRequestError(slot.subtype, requestId, message));
    return true;
  }

  /** Settle a single slot with a local error (write failure). */
  reject(requestId: string, error: Error): boolean {
    const slot = this.take(requestId);
    if (!slot) return false;
    slot.reject(error);
    return true;
  }

  rejectAll(makeError: () => Error): void {
    for (const [requestId] of this.slots) {
      this.reject(requestId, makeError());
    }
  }

  private take(requestId: string): PendingSlot | undefined {
    const slot = this.slots.get(requestId);
    if (!slot) return undefined;
    this.slots.delete(requestId);
    if (slot.timer) clearTimeout(slot.timer);
    return slot;
  }
}
