/**
 * Vote casting
 *
 * One vote per node per poll, enforced by the store's UNIQUE constraint
 * rather than a read-then-write check. Each vote carries the voter's
 * signature over its canonical payload.
 */

import { v4 as uuidv4 } from 'uuid';
import { Crypto } from './crypto.js';
import { isUniqueViolation } from './storage.js';
import type { SQLiteHiveStore } from './storage.js';
import { callSigner } from './adapters/signer.js';
import type { SignerAdapter } from './adapters/signer.js';
import type { TierAuthority } from './tier.js';
import type { Outbox } from './outbox.js';
import type { PollManager } from './poll.js';
import { computeStatus } from './poll.js';
import { normalizeNodeKey } from './identity.js';
import type { Clock, NodePublicKey, Poll, Signature, Vote, VoteChoice, VoteSummary } from './types.js';
import { SPOIL, HiveError, ErrorCodes } from './types.js';

export const MAX_REASON_LENGTH = 500;
export const DEFAULT_MY_VOTES_LIMIT = 50;
export const MAX_MY_VOTES_LIMIT = 500;

export interface CastVoteRequest {
  pollId: string;
  voter: NodePublicKey;
  choice: VoteChoice;
  reason?: string;
  signature: Signature;
}

export function isVoteChoice(value: unknown): value is VoteChoice {
  return value === SPOIL || (typeof value === 'number' && Number.isInteger(value) && value >= 0);
}

/**
 * Map option text, a numeric index or the spoil marker to a choice
 */
export function parseChoice(poll: Poll, raw: unknown): VoteChoice {
  if (typeof raw === 'number') {
    if (isVoteChoice(raw) && raw < poll.options.length) return raw;
    throw new HiveError(`Choice index out of range: ${raw}`, ErrorCodes.INVALID_CHOICE);
  }
  if (typeof raw === 'string') {
    const text = raw.trim();
    if (text.toLowerCase() === SPOIL) return SPOIL;
    const index = poll.options.indexOf(text);
    if (index >= 0) return index;
    if (/^\d+$/.test(text)) {
      return parseChoice(poll, parseInt(text, 10));
    }
  }
  throw new HiveError(`Not an option of this poll: ${String(raw)}`, ErrorCodes.INVALID_CHOICE);
}

export class VoteManager {
  constructor(
    private store: SQLiteHiveStore,
    private polls: PollManager,
    private tiers: TierAuthority,
    private signer: SignerAdapter,
    private outbox: Outbox,
    private clock: Clock
  ) {}

  /**
   * Canonical text a voter signs
   */
  static payloadFor(pollId: string, voter: NodePublicKey, choice: VoteChoice, reason: string): string {
    return Crypto.votePayload({ pollId, voter: voter.toLowerCase(), choice, reason });
  }

  async castVote(request: CastVoteRequest): Promise<Vote> {
    const voter = normalizeNodeKey(request.voter);
    const reason = request.reason ?? '';

    if (typeof reason !== 'string' || reason.length > MAX_REASON_LENGTH) {
      throw new HiveError(`Reason exceeds ${MAX_REASON_LENGTH} characters`, ErrorCodes.REASON_TOO_LONG);
    }
    if (!isVoteChoice(request.choice)) {
      throw new HiveError('Choice must be an option index or "spoil"', ErrorCodes.INVALID_CHOICE);
    }

    const poll = this.polls.requirePoll(request.pollId);
    this.assertChoiceInRange(poll, request.choice);

    // Outside the transaction: the signer may be remote
    const payload = VoteManager.payloadFor(poll.pollId, voter, request.choice, reason);
    const signature = request.signature;
    const valid = typeof signature === 'string'
      && await callSigner(() => this.signer.verifyMessage(payload, signature, voter));
    if (!valid) {
      throw new HiveError('Vote signature does not verify against the voter key', ErrorCodes.INVALID_SIGNATURE);
    }

    return this.store.transaction(() => {
      const current = this.polls.requirePoll(poll.pollId);
      this.tiers.requireGovernance(voter);

      const now = this.clock();
      if (computeStatus(current, now) !== 'active') {
        throw new HiveError('Poll is closed', ErrorCodes.POLL_CLOSED, 409);
      }

      const vote: Vote = {
        voteId: uuidv4(),
        pollId: current.pollId,
        voter,
        choice: request.choice,
        reason,
        signature: request.signature,
        castAt: now,
      };

      try {
        this.store.insertVote(vote);
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw new HiveError('Node has already voted in this poll', ErrorCodes.DUPLICATE_VOTE, 409);
        }
        throw error;
      }

      this.outbox.enqueue('vote-sync', { ...vote });
      console.log(`[Vote] Recorded vote ${vote.voteId} on poll ${vote.pollId}`);
      return vote;
    });
  }

  /**
   * A voter's most recent votes with the poll they belong to
   */
  myVotes(voter: NodePublicKey, limit: number = DEFAULT_MY_VOTES_LIMIT): VoteSummary[] {
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_MY_VOTES_LIMIT) {
      throw new HiveError(`Limit must be between 1 and ${MAX_MY_VOTES_LIMIT}`, ErrorCodes.VALIDATION_ERROR);
    }
    const now = this.clock();
    return this.store.listVotesByVoter(normalizeNodeKey(voter), limit).map(row => ({
      ...row.vote,
      title: row.title,
      pollType: row.pollType,
      deadline: row.deadline,
      status: computeStatus(row, now),
    }));
  }

  private assertChoiceInRange(poll: Poll, choice: VoteChoice): void {
    if (choice !== SPOIL && choice >= poll.options.length) {
      throw new HiveError(`Choice index out of range: ${choice}`, ErrorCodes.INVALID_CHOICE);
    }
  }
}
