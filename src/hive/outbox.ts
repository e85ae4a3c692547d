/**
 * Delivery subsystem
 *
 * Mutations that should reach the coordinator are written to the outbox in
 * the same transaction as the mutation itself. A drain later delivers them,
 * oldest first, with exponential backoff per entry and a circuit breaker
 * across entries. Local state never depends on delivery succeeding.
 */

import { v4 as uuidv4 } from 'uuid';
import type { SQLiteHiveStore } from './storage.js';
import type { CoordinatorClient } from './adapters/coordinator.js';
import type { DeliveryConfig, HiveConfig } from './config.js';
import type {
  Clock,
  DrainSummary,
  OutboxEntry,
  OutboxOperation,
  OutboxStatus,
  Timestamp,
} from './types.js';
import { HiveError, ErrorCodes, errorMessage } from './types.js';

/**
 * Seconds to wait before the next attempt, given how many attempts have
 * failed so far (at least 1)
 */
export function computeBackoff(
  attempts: number,
  config: Pick<DeliveryConfig, 'backoffBaseSeconds' | 'backoffMaxSeconds' | 'jitterRatio'>,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, attempts - 1);
  const delay = Math.min(config.backoffBaseSeconds * 2 ** exponent, config.backoffMaxSeconds);
  const jitter = Math.floor(delay * config.jitterRatio * random());
  return delay + jitter;
}

export type BreakerState = 'closed' | 'open' | 'half-open';

/**
 * Circuit breaker over coordinator deliveries.
 * closed -> open after `threshold` consecutive failures; open -> half-open
 * once the cool-down has passed; a half-open probe closes or reopens it.
 */
export class DeliveryBreaker {
  private state: BreakerState = 'closed';
  private consecutiveFailures = 0;
  private openedAt: Timestamp = 0;
  private probeInFlight = false;

  constructor(
    private threshold: number,
    private cooldownSeconds: number,
    private clock: Clock
  ) {}

  /**
   * Whether a delivery may be attempted now. In half-open state only the
   * first caller gets through.
   */
  allowRequest(): boolean {
    if (this.state === 'open') {
      if (this.clock() < this.openedAt + this.cooldownSeconds) {
        return false;
      }
      this.state = 'half-open';
      this.probeInFlight = false;
      console.log('[Outbox] Breaker half-open, probing coordinator');
    }

    if (this.state === 'half-open') {
      if (this.probeInFlight) return false;
      this.probeInFlight = true;
    }

    return true;
  }

  recordSuccess(): void {
    if (this.state !== 'closed') {
      console.log('[Outbox] Breaker closed');
    }
    this.state = 'closed';
    this.consecutiveFailures = 0;
    this.probeInFlight = false;
  }

  /**
   * Give back a half-open probe slot that was not used
   */
  releaseProbe(): void {
    this.probeInFlight = false;
  }

  recordFailure(): void {
    this.consecutiveFailures++;
    if (this.state === 'half-open' || this.consecutiveFailures >= this.threshold) {
      if (this.state !== 'open') {
        console.warn(`[Outbox] Breaker open for ${this.cooldownSeconds}s after ${this.consecutiveFailures} consecutive failures`);
      }
      this.state = 'open';
      this.openedAt = this.clock();
      this.probeInFlight = false;
    }
  }

  /**
   * Current state as observed now (an expired open breaker reads as half-open)
   */
  getState(): BreakerState {
    if (this.state === 'open' && this.clock() >= this.openedAt + this.cooldownSeconds) {
      return 'half-open';
    }
    return this.state;
  }

  getStats(): { state: BreakerState; consecutiveFailures: number; openedAt: Timestamp | null } {
    return {
      state: this.getState(),
      consecutiveFailures: this.consecutiveFailures,
      openedAt: this.state === 'open' ? this.openedAt : null,
    };
  }
}

export class Outbox {
  private breaker: DeliveryBreaker;
  private draining = false;

  constructor(
    private store: SQLiteHiveStore,
    private client: CoordinatorClient | null,
    private config: Readonly<HiveConfig>,
    private clock: Clock,
    private random: () => number = Math.random
  ) {
    this.breaker = new DeliveryBreaker(
      config.delivery.breakerThreshold,
      config.delivery.breakerCooldownSeconds,
      clock
    );
  }

  /**
   * Network sync is on and the coordinator URL passed validation
   */
  isEnabled(): boolean {
    return this.config.networkEnabled && this.config.coordinatorUrl !== '' && this.client !== null;
  }

  getBreaker(): DeliveryBreaker {
    return this.breaker;
  }

  /**
   * Queue a payload for delivery. Call inside the mutation's transaction.
   * A failed insert is logged and the caller's mutation still commits.
   */
  enqueue(operation: OutboxOperation, payload: Record<string, unknown>): OutboxEntry | null {
    if (!this.isEnabled()) return null;

    const now = this.clock();
    const entry: OutboxEntry = {
      entryId: uuidv4(),
      operation,
      payload,
      attempts: 0,
      nextAttemptAt: now,
      status: 'pending',
      lastError: null,
      createdAt: now,
      updatedAt: now,
    };

    try {
      // Savepoint, so a failed insert leaves the outer transaction intact
      this.store.transaction(() => this.store.insertOutboxEntry(entry));
      return entry;
    } catch (error) {
      console.error(`[Outbox] Failed to enqueue ${operation}: ${errorMessage(error)}`);
      return null;
    }
  }

  /**
   * Deliver due entries. Never throws for delivery failures; they are
   * recorded on the entries and summarized.
   */
  async drain(): Promise<DrainSummary> {
    const summary: DrainSummary = {
      processed: 0,
      succeeded: 0,
      failed: 0,
      abandoned: 0,
      breakerOpen: false,
    };

    if (!this.client || !this.isEnabled()) {
      return summary;
    }
    if (this.draining) {
      console.log('[Outbox] Drain already in progress');
      return summary;
    }

    this.draining = true;
    try {
      const due = this.store.dueOutboxEntries(this.clock(), this.config.delivery.batchSize);

      for (const entry of due) {
        if (!this.breaker.allowRequest()) {
          break;
        }

        const now = this.clock();
        if (!this.store.claimOutboxEntry(entry.entryId, now, now + this.claimLeaseSeconds())) {
          // Taken by a drain on another connection
          this.breaker.releaseProbe();
          continue;
        }

        summary.processed++;
        try {
          await this.client.deliver(entry.operation, entry.payload);
          this.store.deleteOutboxEntry(entry.entryId);
          this.breaker.recordSuccess();
          summary.succeeded++;
        } catch (error) {
          this.breaker.recordFailure();
          summary.failed++;
          if (this.recordFailure(entry, error) === 'abandoned') {
            summary.abandoned++;
          }
        }
      }
    } finally {
      this.draining = false;
    }

    summary.breakerOpen = this.breaker.getState() === 'open';
    if (summary.processed > 0) {
      console.log(
        `[Outbox] Drained ${summary.processed}: ${summary.succeeded} delivered, ${summary.failed} failed, ${summary.abandoned} abandoned`
      );
    }
    return summary;
  }

  /**
   * Seconds a claimed entry stays out of other drains: the DNS check plus
   * the request itself
   */
  private claimLeaseSeconds(): number {
    return 2 * Math.ceil(this.config.delivery.requestTimeoutMs / 1000);
  }

  private recordFailure(entry: OutboxEntry, error: unknown): OutboxStatus | null {
    const lastError = errorMessage(error);

    const outcome = this.store.transaction(() => {
      const attempts = this.store.incrementOutboxAttempts(entry.entryId);
      if (attempts === null) return null;

      const now = this.clock();
      const status: OutboxStatus = attempts >= this.config.delivery.maxAttempts ? 'abandoned' : 'pending';
      this.store.recordOutboxFailure(entry.entryId, {
        nextAttemptAt: now + computeBackoff(attempts, this.config.delivery, this.random),
        status,
        lastError,
        updatedAt: now,
      });
      return { attempts, status };
    });

    if (!outcome) {
      console.warn(`[Outbox] Entry ${entry.entryId} left the queue during delivery: ${lastError}`);
      return null;
    }

    const { attempts, status } = outcome;
    if (status === 'abandoned') {
      console.warn(`[Outbox] Abandoned ${entry.operation} ${entry.entryId} after ${attempts} attempts: ${lastError}`);
    } else {
      console.warn(`[Outbox] Delivery of ${entry.operation} ${entry.entryId} failed (attempt ${attempts}): ${lastError}`);
    }
    return status;
  }

  /**
   * Put an entry back in the queue with its attempts reset
   */
  retry(entryId: string): OutboxEntry {
    return this.store.transaction(() => {
      const entry = this.store.getOutboxEntry(entryId);
      if (!entry) {
        throw new HiveError(`Outbox entry not found: ${entryId}`, ErrorCodes.OUTBOX_ENTRY_NOT_FOUND, 404);
      }
      this.store.resetOutboxEntry(entryId, this.clock());
      const updated = this.store.getOutboxEntry(entryId);
      if (!updated) {
        throw new HiveError(`Outbox entry not found: ${entryId}`, ErrorCodes.OUTBOX_ENTRY_NOT_FOUND, 404);
      }
      return updated;
    });
  }

  /**
   * Delete abandoned entries, optionally only those last touched before `olderThan`
   */
  pruneAbandoned(olderThan?: Timestamp): number {
    return this.store.transaction(() => this.store.deleteAbandonedEntries(olderThan));
  }

  list(status?: OutboxStatus): OutboxEntry[] {
    return this.store.listOutboxEntries(status);
  }
}
