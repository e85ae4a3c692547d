/**
 * Coordinator Adapter
 * Mirrors local identities, polls and votes to the remote coordinator.
 *
 * Endpoints:
 * - POST /api/v1/did/generate         identity-generate
 * - POST /api/v1/polls                poll-create
 * - POST /api/v1/polls/:pollId/votes  vote-sync
 */

import { assertRoutableHost, systemResolver } from '../netguard.js';
import type { HostResolver } from '../netguard.js';
import type { OutboxOperation } from '../types.js';

export interface CoordinatorConfig {
  baseUrl: string;
  /** Sent as a Bearer token when non-empty */
  token?: string;
  timeout?: number;
  resolve?: HostResolver;
  fetch?: typeof fetch;
}

export interface CoordinatorClient {
  /**
   * Deliver one outbox payload. Resolves on a 2xx response, rejects otherwise.
   */
  deliver(operation: OutboxOperation, payload: Record<string, unknown>): Promise<void>;
}

export class CoordinatorError extends Error {
  constructor(
    message: string,
    public readonly status: number | null = null
  ) {
    super(message);
    this.name = 'CoordinatorError';
  }
}

/**
 * Path for an operation, relative to the coordinator base URL
 */
export function coordinatorPath(operation: OutboxOperation, payload: Record<string, unknown>): string {
  switch (operation) {
    case 'identity-generate':
      return '/api/v1/did/generate';
    case 'poll-create':
      return '/api/v1/polls';
    case 'vote-sync': {
      const pollId = payload.pollId;
      if (typeof pollId !== 'string' || pollId.length === 0) {
        throw new CoordinatorError('vote-sync payload has no pollId');
      }
      return `/api/v1/polls/${encodeURIComponent(pollId)}/votes`;
    }
  }
}

/**
 * HTTP coordinator client. Every call checks the resolved addresses of the
 * host before connecting.
 */
export class HttpCoordinatorClient implements CoordinatorClient {
  private timeout: number;
  private resolve: HostResolver;
  private fetchImpl: typeof fetch;

  constructor(private config: CoordinatorConfig) {
    this.timeout = config.timeout ?? 10000;
    this.resolve = config.resolve ?? systemResolver;
    this.fetchImpl = config.fetch ?? fetch;
  }

  async deliver(operation: OutboxOperation, payload: Record<string, unknown>): Promise<void> {
    const url = new URL(this.config.baseUrl + coordinatorPath(operation, payload));
    await assertRoutableHost(url.hostname, this.resolve);

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.token) {
      headers.Authorization = `Bearer ${this.config.token}`;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await this.fetchImpl(url.toString(), {
        method: 'POST',
        headers,
        body: JSON.stringify(payload),
        // A redirect could point at an address that was never checked
        redirect: 'error',
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await response.text().catch(() => '');
        throw new CoordinatorError(
          `Coordinator returned ${response.status} for ${operation}${body ? ` - ${body}` : ''}`,
          response.status
        );
      }
    } catch (error) {
      if (controller.signal.aborted) {
        throw new CoordinatorError(`Coordinator request timed out after ${this.timeout}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export interface Delivery {
  operation: OutboxOperation;
  payload: Record<string, unknown>;
}

/**
 * Mock coordinator for testing and development
 */
export class MockCoordinatorClient implements CoordinatorClient {
  readonly deliveries: Delivery[] = [];
  private failuresRemaining = 0;
  private failAlways = false;

  /**
   * Fail the next `count` deliveries
   */
  failNext(count: number): void {
    this.failuresRemaining = count;
  }

  setFailing(failing: boolean): void {
    this.failAlways = failing;
  }

  async deliver(operation: OutboxOperation, payload: Record<string, unknown>): Promise<void> {
    if (this.failAlways) {
      throw new CoordinatorError('Coordinator unreachable', 503);
    }
    if (this.failuresRemaining > 0) {
      this.failuresRemaining--;
      throw new CoordinatorError('Coordinator unreachable', 503);
    }
    this.deliveries.push({ operation, payload });
  }
}
