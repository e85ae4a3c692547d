/**
 * Poll creation and retention tests
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import {
  createTestHiveGovernance,
  MockBalanceOracle,
  type CreatePollRequest,
  type HiveGovernance,
} from '../src/hive/index.js';

const T0 = 1_700_000_000;

function pollRequest(overrides: Partial<CreatePollRequest> = {}): CreatePollRequest {
  return {
    pollType: 'generic',
    title: 'Open a channel to the new routing peer?',
    options: ['yes', 'no', 'abstain'],
    deadline: T0 + 3600,
    ...overrides,
  };
}

describe('PollManager', () => {
  let hive: HiveGovernance;
  let now: number;

  async function governanceNode(config: { maxPolls?: number; maxVotes?: number } = {}): Promise<HiveGovernance> {
    const node = createTestHiveGovernance({
      balance: new MockBalanceOracle(100_000),
      clock: () => now,
      config,
    });
    await node.provisionIdentity();
    await node.upgrade(60_000);
    return node;
  }

  beforeEach(async () => {
    now = T0;
    hive = await governanceNode();
  });

  describe('createPoll', () => {
    it('should create a poll owned by the node', async () => {
      const poll = await hive.createPoll(pollRequest({ metadata: { peer: '03' + 'cd'.repeat(32) } }));

      expect(poll.pollType).toBe('generic');
      expect(poll.options).toEqual(['yes', 'no', 'abstain']);
      expect(poll.creator).toBe((await hive.status()).nodePublicKey);
      expect(poll.createdAt).toBe(T0);
      expect(poll.metadata).toEqual({ peer: '03' + 'cd'.repeat(32) });
      expect(hive.polls.getPoll(poll.pollId)).toEqual(poll);
    });

    it('should trim the title and options', async () => {
      const poll = await hive.createPoll(pollRequest({ title: '  Ban peer?  ', options: [' yes ', 'no'] }));

      expect(poll.title).toBe('Ban peer?');
      expect(poll.options).toEqual(['yes', 'no']);
    });

    it('should default metadata to an empty object', async () => {
      const poll = await hive.createPoll(pollRequest());
      expect(poll.metadata).toEqual({});
    });

    it('should require the governance tier', async () => {
      const basic = createTestHiveGovernance({ clock: () => now });
      await basic.provisionIdentity();

      await expect(basic.createPoll(pollRequest())).rejects.toMatchObject({ code: 'InsufficientTier', statusCode: 403 });
    });

    it('should require a provisioned identity', async () => {
      const fresh = createTestHiveGovernance({ clock: () => now });
      await expect(fresh.createPoll(pollRequest())).rejects.toMatchObject({ code: 'IdentityNotFound' });
    });

    it('should reject unknown poll types', async () => {
      await expect(hive.createPoll(pollRequest({ pollType: 'referendum' })))
        .rejects.toMatchObject({ code: 'InvalidPollType' });
    });

    it('should reject empty and oversized titles', async () => {
      await expect(hive.createPoll(pollRequest({ title: '   ' })))
        .rejects.toMatchObject({ code: 'InvalidTitle' });
      await expect(hive.createPoll(pollRequest({ title: 'x'.repeat(201) })))
        .rejects.toMatchObject({ code: 'MetadataTooLarge' });
    });

    it('should reject oversized or non-object metadata', async () => {
      await expect(hive.createPoll(pollRequest({ metadata: { blob: 'x'.repeat(8200) } })))
        .rejects.toMatchObject({ code: 'MetadataTooLarge' });
      await expect(hive.createPoll(pollRequest({ metadata: ['a'] })))
        .rejects.toMatchObject({ code: 'ValidationError' });
    });

    it('should enforce the option count', async () => {
      await expect(hive.createPoll(pollRequest({ options: ['only'] })))
        .rejects.toMatchObject({ code: 'InvalidOptionCount' });
      const eleven = Array.from({ length: 11 }, (_, i) => `option ${i}`);
      await expect(hive.createPoll(pollRequest({ options: eleven })))
        .rejects.toMatchObject({ code: 'InvalidOptionCount' });
    });

    it('should reject bad options', async () => {
      await expect(hive.createPoll(pollRequest({ options: 'yes,no' })))
        .rejects.toMatchObject({ code: 'InvalidOptions' });
      await expect(hive.createPoll(pollRequest({ options: ['yes', 'yes'] })))
        .rejects.toMatchObject({ code: 'InvalidOptions' });
      await expect(hive.createPoll(pollRequest({ options: ['yes', ''] })))
        .rejects.toMatchObject({ code: 'InvalidOptions' });
      await expect(hive.createPoll(pollRequest({ options: ['yes', 'x'.repeat(65)] })))
        .rejects.toMatchObject({ code: 'InvalidOptions' });
      await expect(hive.createPoll(pollRequest({ options: ['yes', 7] })))
        .rejects.toMatchObject({ code: 'InvalidOptions' });
    });

    it('should reserve the spoil marker', async () => {
      await expect(hive.createPoll(pollRequest({ options: ['yes', 'Spoil'] })))
        .rejects.toMatchObject({ code: 'InvalidOptions' });
    });

    it('should require a future integer deadline', async () => {
      await expect(hive.createPoll(pollRequest({ deadline: T0 })))
        .rejects.toMatchObject({ code: 'InvalidDeadline' });
      await expect(hive.createPoll(pollRequest({ deadline: T0 + 0.5 })))
        .rejects.toMatchObject({ code: 'InvalidDeadline' });
    });

    it('should not store rejected polls', async () => {
      await expect(hive.createPoll(pollRequest({ options: ['only'] }))).rejects.toBeDefined();
      expect((await hive.status()).polls.total).toBe(0);
    });
  });

  describe('status', () => {
    it('should close at the deadline', async () => {
      const poll = await hive.createPoll(pollRequest({ deadline: T0 + 100 }));

      now = T0 + 99;
      expect(hive.pollStatus(poll.pollId).status).toBe('active');
      now = T0 + 100;
      expect(hive.pollStatus(poll.pollId).status).toBe('closed');
    });

    it('should report unknown polls', () => {
      expect(() => hive.pollStatus('missing')).toThrow(expect.objectContaining({ code: 'PollNotFound', statusCode: 404 }));
    });
  });

  describe('prune', () => {
    it('should remove the oldest closed polls and their votes when over the bound', async () => {
      hive = await governanceNode({ maxPolls: 2 });
      const first = await hive.createPoll(pollRequest({ deadline: T0 + 100 }));
      const second = await hive.createPoll(pollRequest({ deadline: T0 + 200 }));
      await hive.vote(first.pollId, 'yes');
      const third = await hive.createPoll(pollRequest({ deadline: T0 + 300 }));

      // Nothing is closed yet, so creation could not prune
      expect((await hive.status()).polls.total).toBe(3);

      now = T0 + 250;
      expect(hive.prune()).toEqual({ pollsRemoved: 1, votesRemoved: 1 });
      expect(hive.polls.getPoll(first.pollId)).toBeNull();
      expect(hive.polls.getPoll(second.pollId)).not.toBeNull();
      expect(hive.polls.getPoll(third.pollId)).not.toBeNull();
      expect((await hive.status()).votes.total).toBe(0);
    });

    it('should prune closed polls when a new poll exceeds the bound', async () => {
      hive = await governanceNode({ maxPolls: 1 });
      const first = await hive.createPoll(pollRequest({ deadline: T0 + 100 }));
      now = T0 + 150;
      const second = await hive.createPoll(pollRequest({ deadline: T0 + 3600 }));

      expect(hive.polls.getPoll(first.pollId)).toBeNull();
      expect(hive.polls.getPoll(second.pollId)).not.toBeNull();
    });

    it('should keep a created poll when the follow-up prune fails', async () => {
      const error = jest.spyOn(console, 'error').mockImplementation(() => {});
      jest.spyOn(hive.polls, 'prune').mockImplementation(() => {
        throw new Error('disk I/O error');
      });

      const poll = await hive.createPoll(pollRequest());

      expect(hive.polls.getPoll(poll.pollId)).toEqual(poll);
      expect(error).toHaveBeenCalledWith(`[Poll] Auto-prune after creating ${poll.pollId} failed: disk I/O error`);
      error.mockRestore();
    });

    it('should never remove active polls', async () => {
      hive = await governanceNode({ maxPolls: 1 });
      await hive.createPoll(pollRequest());
      await hive.createPoll(pollRequest());

      expect(hive.prune()).toEqual({ pollsRemoved: 0, votesRemoved: 0 });
      expect((await hive.status()).polls.total).toBe(2);
    });

    it('should remove closed polls older than the retention period', async () => {
      const closed = await hive.createPoll(pollRequest({ deadline: T0 + 100 }));
      const active = await hive.createPoll(pollRequest({ deadline: T0 + 10 * 86_400 }));

      now = T0 + 100 + 2 * 86_400;
      expect(hive.prune(1)).toEqual({ pollsRemoved: 1, votesRemoved: 0 });
      expect(hive.polls.getPoll(closed.pollId)).toBeNull();
      expect(hive.polls.getPoll(active.pollId)).not.toBeNull();
    });

    it('should keep closed polls inside the retention period', async () => {
      await hive.createPoll(pollRequest({ deadline: T0 + 100 }));
      now = T0 + 200;

      expect(hive.prune(1)).toEqual({ pollsRemoved: 0, votesRemoved: 0 });
    });

    it('should reject a non-positive retention period', () => {
      expect(() => hive.prune(0)).toThrow(expect.objectContaining({ code: 'ValidationError' }));
    });
  });
});
