/**
 * End-to-end node flows
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  HiveGovernance,
  createTestHiveGovernance,
  MockBalanceOracle,
  MockCoordinatorClient,
  MockSigner,
} from '../src/hive/index.js';

const T0 = 1_700_000_000;

describe('Hive governance', () => {
  let now: number;
  let balance: MockBalanceOracle;

  beforeEach(() => {
    now = T0;
    balance = new MockBalanceOracle(100_000);
  });

  it('should keep every DID of a reprovisioned node resolvable', async () => {
    const hive = createTestHiveGovernance({ balance, clock: () => now });

    const first = await hive.provisionIdentity();
    const second = await hive.provisionIdentity({ reprovision: true });
    const status = await hive.status();

    expect(second.did).not.toBe(first.did);
    expect(second.nodePublicKey).toBe(first.nodePublicKey);
    expect(status.identity?.did).toBe(second.did);
    expect(hive.identities.resolve(first.did)?.did).toBe(second.did);
    expect(hive.identities.resolve(second.did)?.did).toBe(second.did);
  });

  it('should tally a poll voted on by two governance nodes', async () => {
    const alice = createTestHiveGovernance({ balance, clock: () => now });
    const bob = new HiveGovernance({
      config: alice.config,
      signer: new MockSigner(),
      balance,
      store: alice.store,
      clock: () => now,
    });
    for (const node of [alice, bob]) {
      await node.provisionIdentity();
      await node.upgrade(75_000);
    }

    const poll = await alice.createPoll({
      pollType: 'generic',
      title: 'Adopt the new fee policy?',
      options: ['yes', 'no', 'abstain'],
      deadline: now + 3600,
    });
    await alice.vote(poll.pollId, 'yes');
    await bob.vote(poll.pollId, 'spoil');

    // A second ballot from the same node changes nothing
    await expect(alice.vote(poll.pollId, 'no')).rejects.toMatchObject({ code: 'DuplicateVote' });

    expect(alice.pollStatus(poll.pollId).tally).toEqual({
      pollId: poll.pollId,
      perOptionCount: { yes: 1, no: 0, abstain: 0 },
      spoiledCount: 1,
      totalVoters: 2,
    });
  });

  it('should work entirely locally while network sync is disabled', async () => {
    const coordinator = new MockCoordinatorClient();
    const hive = createTestHiveGovernance({ balance, coordinator, clock: () => now });

    await hive.provisionIdentity();
    await hive.bind('cln');
    await hive.upgrade(60_000);
    const poll = await hive.createPoll({
      pollType: 'ban',
      title: 'Ban the flapping peer?',
      options: ['ban', 'keep'],
      deadline: now + 600,
    });
    await hive.vote(poll.pollId, 'keep');

    expect(hive.listOutbox()).toHaveLength(0);
    expect(await hive.processOutbox()).toMatchObject({ processed: 0 });
    expect(coordinator.deliveries).toHaveLength(0);
    expect((await hive.status()).sync).toEqual({
      networkEnabled: false,
      coordinatorUrl: null,
      pending: 0,
      abandoned: 0,
      breaker: 'closed',
    });
  });

  it('should queue and retry while the coordinator is unreachable', async () => {
    const coordinator = new MockCoordinatorClient();
    coordinator.setFailing(true);
    const hive = createTestHiveGovernance({
      balance,
      coordinator,
      clock: () => now,
      config: { networkEnabled: true, coordinatorUrl: 'https://coordinator.example.com' },
    });

    const identity = await hive.provisionIdentity();
    expect((await hive.status()).identity?.did).toBe(identity.did);
    expect(hive.listOutbox()).toHaveLength(1);

    const schedule: number[] = [];
    for (let attempt = 1; attempt <= 3; attempt++) {
      await hive.processOutbox();
      const [entry] = hive.listOutbox();
      expect(entry.attempts).toBe(attempt);
      schedule.push(entry.nextAttemptAt - now);
      now = entry.nextAttemptAt;
    }
    expect(schedule).toEqual([30, 60, 120]);

    coordinator.setFailing(false);
    expect(await hive.processOutbox()).toMatchObject({ processed: 1, succeeded: 1 });
    expect(hive.listOutbox()).toHaveLength(0);
  });
});
