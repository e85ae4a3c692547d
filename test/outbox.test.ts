/**
 * Outbox delivery tests
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import {
  HiveGovernance,
  createTestHiveGovernance,
  computeBackoff,
  DeliveryBreaker,
  HttpCoordinatorClient,
  MockBalanceOracle,
  MockCoordinatorClient,
  MockSigner,
  type CoordinatorClient,
} from '../src/hive/index.js';

const T0 = 1_700_000_000;
const COORDINATOR_URL = 'https://coordinator.example.com';

describe('computeBackoff', () => {
  const config = { backoffBaseSeconds: 30, backoffMaxSeconds: 3600, jitterRatio: 0.1 };

  it('should double per attempt up to the cap', () => {
    expect(computeBackoff(1, config, () => 0)).toBe(30);
    expect(computeBackoff(2, config, () => 0)).toBe(60);
    expect(computeBackoff(3, config, () => 0)).toBe(120);
    expect(computeBackoff(10, config, () => 0)).toBe(3600);
  });

  it('should add bounded jitter', () => {
    expect(computeBackoff(1, config, () => 0.5)).toBe(31);
    expect(computeBackoff(2, config, () => 0.99)).toBe(65);
  });
});

describe('DeliveryBreaker', () => {
  let now: number;
  let breaker: DeliveryBreaker;

  beforeEach(() => {
    now = T0;
    breaker = new DeliveryBreaker(2, 300, () => now);
  });

  it('should open after consecutive failures', () => {
    breaker.recordFailure();
    expect(breaker.getState()).toBe('closed');
    breaker.recordFailure();
    expect(breaker.getState()).toBe('open');
    expect(breaker.allowRequest()).toBe(false);
  });

  it('should reset the failure count on success', () => {
    breaker.recordFailure();
    breaker.recordSuccess();
    breaker.recordFailure();
    expect(breaker.getState()).toBe('closed');
  });

  it('should allow a single probe after the cool-down', () => {
    breaker.recordFailure();
    breaker.recordFailure();
    now += 300;

    expect(breaker.getState()).toBe('half-open');
    expect(breaker.allowRequest()).toBe(true);
    expect(breaker.allowRequest()).toBe(false);

    breaker.recordSuccess();
    expect(breaker.getState()).toBe('closed');
    expect(breaker.allowRequest()).toBe(true);
  });

  it('should give back a probe slot that went unused', () => {
    breaker.recordFailure();
    breaker.recordFailure();
    now += 300;

    expect(breaker.allowRequest()).toBe(true);
    breaker.releaseProbe();
    expect(breaker.allowRequest()).toBe(true);
    expect(breaker.allowRequest()).toBe(false);
  });

  it('should reopen when the probe fails', () => {
    breaker.recordFailure();
    breaker.recordFailure();
    now += 300;
    breaker.allowRequest();
    breaker.recordFailure();

    expect(breaker.getStats()).toEqual({ state: 'open', consecutiveFailures: 3, openedAt: T0 + 300 });
  });
});

describe('Outbox', () => {
  let now: number;
  let coordinator: MockCoordinatorClient;

  function networkNode(
    delivery: { maxAttempts?: number; breakerThreshold?: number } = {},
    client: CoordinatorClient = coordinator
  ): HiveGovernance {
    return createTestHiveGovernance({
      balance: new MockBalanceOracle(100_000),
      coordinator: client,
      clock: () => now,
      config: { networkEnabled: true, coordinatorUrl: COORDINATOR_URL, delivery },
    });
  }

  beforeEach(() => {
    now = T0;
    coordinator = new MockCoordinatorClient();
  });

  describe('enqueue', () => {
    it('should queue mutations alongside the local write', async () => {
      const hive = networkNode();
      const identity = await hive.provisionIdentity();

      const [entry] = hive.listOutbox();
      expect(entry).toMatchObject({
        operation: 'identity-generate',
        attempts: 0,
        status: 'pending',
        nextAttemptAt: T0,
        lastError: null,
      });
      expect(entry.payload).toEqual({
        did: identity.did,
        nodePublicKey: identity.nodePublicKey,
        generation: 0,
        createdAt: T0,
      });
    });

    it('should queue polls and votes', async () => {
      const hive = networkNode();
      await hive.provisionIdentity();
      await hive.upgrade(60_000);
      const poll = await hive.createPoll({
        pollType: 'generic',
        title: 'Rebalance?',
        options: ['yes', 'no'],
        deadline: T0 + 3600,
      });
      const vote = await hive.vote(poll.pollId, 'yes');

      const entries = hive.listOutbox();
      expect(entries.map(e => e.operation)).toEqual(['identity-generate', 'poll-create', 'vote-sync']);
      expect(entries[2].payload).toMatchObject({ voteId: vote.voteId, pollId: poll.pollId, choice: 0 });
    });

    it('should not queue when the coordinator URL is rejected', async () => {
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
      const hive = createTestHiveGovernance({
        config: { networkEnabled: true, coordinatorUrl: 'http://coordinator.example.com' },
      });
      await hive.provisionIdentity();

      expect(hive.outbox.isEnabled()).toBe(false);
      expect(hive.listOutbox()).toHaveLength(0);
      warn.mockRestore();
    });
  });

  describe('drain', () => {
    it('should deliver and remove due entries', async () => {
      const hive = networkNode();
      const identity = await hive.provisionIdentity();

      const summary = await hive.processOutbox();

      expect(summary).toEqual({ processed: 1, succeeded: 1, failed: 0, abandoned: 0, breakerOpen: false });
      expect(coordinator.deliveries).toEqual([{
        operation: 'identity-generate',
        payload: { did: identity.did, nodePublicKey: identity.nodePublicKey, generation: 0, createdAt: T0 },
      }]);
      expect(hive.listOutbox()).toHaveLength(0);
    });

    it('should keep local state when the coordinator is unreachable', async () => {
      coordinator.setFailing(true);
      const hive = networkNode();
      await hive.provisionIdentity();
      await hive.upgrade(60_000);
      const poll = await hive.createPoll({
        pollType: 'generic',
        title: 'Rebalance?',
        options: ['yes', 'no'],
        deadline: T0 + 3600,
      });
      await hive.vote(poll.pollId, 'no');

      const summary = await hive.processOutbox();
      expect(summary).toMatchObject({ processed: 3, failed: 3, succeeded: 0 });
      expect(hive.tallies.tally(poll.pollId).perOptionCount).toEqual({ yes: 0, no: 1 });
    });

    it('should back off exponentially between attempts', async () => {
      coordinator.setFailing(true);
      const hive = networkNode();
      await hive.provisionIdentity();

      await hive.processOutbox();
      let [entry] = hive.listOutbox();
      expect(entry).toMatchObject({
        attempts: 1,
        status: 'pending',
        nextAttemptAt: T0 + 30,
        lastError: 'Coordinator unreachable',
      });

      // Not due yet
      now = T0 + 29;
      expect((await hive.processOutbox()).processed).toBe(0);

      now = T0 + 31;
      await hive.processOutbox();
      [entry] = hive.listOutbox();
      expect(entry.attempts).toBe(2);
      expect(entry.nextAttemptAt).toBe(T0 + 31 + 60);
    });

    it('should abandon entries after the maximum attempts', async () => {
      coordinator.setFailing(true);
      const hive = networkNode({ maxAttempts: 2 });
      await hive.provisionIdentity();

      await hive.processOutbox();
      now = T0 + 31;
      const summary = await hive.processOutbox();

      expect(summary.abandoned).toBe(1);
      expect(hive.listOutbox('pending')).toHaveLength(0);
      expect(hive.listOutbox('abandoned')).toHaveLength(1);

      now = T0 + 10_000;
      expect((await hive.processOutbox()).processed).toBe(0);
    });

    it('should stop once the breaker opens and resume after the cool-down', async () => {
      coordinator.setFailing(true);
      const hive = networkNode({ breakerThreshold: 2 });
      await hive.provisionIdentity();
      await hive.provisionIdentity({ reprovision: true });
      await hive.provisionIdentity({ reprovision: true });

      expect(await hive.processOutbox()).toEqual({
        processed: 2,
        succeeded: 0,
        failed: 2,
        abandoned: 0,
        breakerOpen: true,
      });
      expect((await hive.status()).sync.breaker).toBe('open');

      now = T0 + 300;
      coordinator.setFailing(false);
      expect(await hive.processOutbox()).toEqual({
        processed: 3,
        succeeded: 3,
        failed: 0,
        abandoned: 0,
        breakerOpen: false,
      });
      expect(coordinator.deliveries.map(d => d.payload.generation)).toEqual([0, 1, 2]);
    });

    it('should reopen the breaker when the probe fails', async () => {
      coordinator.setFailing(true);
      const hive = networkNode({ breakerThreshold: 1 });
      await hive.provisionIdentity();
      await hive.provisionIdentity({ reprovision: true });

      await hive.processOutbox();
      now = T0 + 300;
      expect(await hive.processOutbox()).toMatchObject({ processed: 1, failed: 1, breakerOpen: true });
    });

    it('should do nothing while network sync is disabled', async () => {
      const hive = createTestHiveGovernance({ coordinator, clock: () => now });
      await hive.provisionIdentity();

      expect(await hive.processOutbox()).toEqual({
        processed: 0,
        succeeded: 0,
        failed: 0,
        abandoned: 0,
        breakerOpen: false,
      });
      expect(coordinator.deliveries).toHaveLength(0);
    });
  });

  describe('claiming', () => {
    it('should not hand an in-flight entry to a second drain', async () => {
      let markStarted: () => void = () => {};
      let release: () => void = () => {};
      const started = new Promise<void>(resolve => {
        markStarted = resolve;
      });
      const deliver = jest.fn<CoordinatorClient['deliver']>(() => new Promise<void>(resolve => {
        release = resolve;
        markStarted();
      }));
      const gated: CoordinatorClient = { deliver };

      const first = networkNode({}, gated);
      await first.provisionIdentity();
      // Separate Outbox on the same store
      const second = new HiveGovernance({
        config: first.config,
        signer: new MockSigner(),
        balance: new MockBalanceOracle(100_000),
        coordinator: gated,
        store: first.store,
        clock: () => now,
      });

      const inFlight = first.processOutbox();
      await started;

      expect(await second.processOutbox()).toMatchObject({ processed: 0 });
      release();
      expect(await inFlight).toMatchObject({ processed: 1, succeeded: 1 });
      expect(deliver).toHaveBeenCalledTimes(1);
      expect(first.listOutbox()).toHaveLength(0);
    });

    it('should claim a due entry only once', async () => {
      const hive = networkNode();
      await hive.provisionIdentity();
      const [entry] = hive.listOutbox();

      expect(hive.store.claimOutboxEntry(entry.entryId, T0, T0 + 20)).toBe(true);
      expect(hive.store.claimOutboxEntry(entry.entryId, T0, T0 + 20)).toBe(false);
      expect(hive.listOutbox()[0].nextAttemptAt).toBe(T0 + 20);
    });

    it('should count attempts from the stored value', async () => {
      const hive = networkNode();
      await hive.provisionIdentity();
      const [entry] = hive.listOutbox();

      expect(hive.store.incrementOutboxAttempts(entry.entryId)).toBe(1);
      expect(hive.store.incrementOutboxAttempts(entry.entryId)).toBe(2);
      expect(hive.store.incrementOutboxAttempts('missing')).toBeNull();
    });

    it('should not lose attempts recorded by another drain', async () => {
      coordinator.setFailing(true);
      const hive = networkNode();
      await hive.provisionIdentity();
      const [entry] = hive.listOutbox();
      // Another worker has already counted a failure since this entry was read
      hive.store.incrementOutboxAttempts(entry.entryId);

      await hive.processOutbox();

      expect(hive.listOutbox()[0]).toMatchObject({ attempts: 2, nextAttemptAt: T0 + 60 });
    });
  });

  describe('retry and prune', () => {
    async function abandonedNode(): Promise<HiveGovernance> {
      coordinator.setFailing(true);
      const hive = networkNode({ maxAttempts: 1 });
      await hive.provisionIdentity();
      await hive.processOutbox();
      return hive;
    }

    it('should requeue an abandoned entry with attempts reset', async () => {
      const hive = await abandonedNode();
      const [entry] = hive.listOutbox('abandoned');

      now = T0 + 500;
      const retried = hive.retryOutboxEntry(entry.entryId);
      expect(retried).toMatchObject({ status: 'pending', attempts: 0, nextAttemptAt: T0 + 500 });

      coordinator.setFailing(false);
      expect((await hive.processOutbox()).succeeded).toBe(1);
    });

    it('should report unknown entries', () => {
      const hive = networkNode();
      expect(() => hive.retryOutboxEntry('missing'))
        .toThrow(expect.objectContaining({ code: 'OutboxEntryNotFound', statusCode: 404 }));
    });

    it('should delete abandoned entries', async () => {
      const hive = await abandonedNode();

      expect(hive.pruneOutbox(T0)).toBe(0);
      expect(hive.pruneOutbox(T0 + 1)).toBe(1);
      expect(hive.listOutbox()).toHaveLength(0);
    });
  });

  describe('HttpCoordinatorClient', () => {
    function okResponse(): Response {
      return new Response(null, { status: 201 });
    }

    it('should post to the operation endpoint with the bearer token', async () => {
      const fetchMock = jest.fn<typeof fetch>().mockResolvedValue(okResponse());
      const client = new HttpCoordinatorClient({
        baseUrl: COORDINATOR_URL,
        token: 'test-token',
        resolve: async () => ['93.184.216.34'],
        fetch: fetchMock,
      });

      await client.deliver('vote-sync', { pollId: 'poll 1', voteId: 'v1' });

      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe(`${COORDINATOR_URL}/api/v1/polls/poll%201/votes`);
      expect(init).toMatchObject({
        method: 'POST',
        redirect: 'error',
        body: '{"pollId":"poll 1","voteId":"v1"}',
        headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-token' },
      });
    });

    it('should omit the authorization header without a token', async () => {
      const fetchMock = jest.fn<typeof fetch>().mockResolvedValue(okResponse());
      const client = new HttpCoordinatorClient({
        baseUrl: COORDINATOR_URL,
        resolve: async () => ['93.184.216.34'],
        fetch: fetchMock,
      });

      await client.deliver('identity-generate', {});

      expect(fetchMock.mock.calls[0][0]).toBe(`${COORDINATOR_URL}/api/v1/did/generate`);
      expect(fetchMock.mock.calls[0][1]?.headers).toEqual({ 'Content-Type': 'application/json' });
    });

    it('should reject non-2xx responses', async () => {
      const fetchMock = jest.fn<typeof fetch>().mockResolvedValue(new Response('busy', { status: 503 }));
      const client = new HttpCoordinatorClient({
        baseUrl: COORDINATOR_URL,
        resolve: async () => ['93.184.216.34'],
        fetch: fetchMock,
      });

      await expect(client.deliver('poll-create', {})).rejects.toMatchObject({
        name: 'CoordinatorError',
        status: 503,
        message: 'Coordinator returned 503 for poll-create - busy',
      });
    });

    it('should never connect to a host resolving to a private address', async () => {
      const fetchMock = jest.fn<typeof fetch>().mockResolvedValue(okResponse());
      const client = new HttpCoordinatorClient({
        baseUrl: COORDINATOR_URL,
        resolve: async () => ['10.0.0.5'],
        fetch: fetchMock,
      });
      const hive = networkNode({}, client);
      await hive.provisionIdentity();

      const summary = await hive.processOutbox();

      expect(summary).toMatchObject({ processed: 1, failed: 1 });
      expect(fetchMock).not.toHaveBeenCalled();
      const [entry] = hive.listOutbox();
      expect(entry.status).toBe('pending');
      expect(entry.lastError).toBe('coordinator.example.com resolves to non-routable address 10.0.0.5 (private)');
    });
  });
});
