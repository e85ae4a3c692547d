/**
 * Poll creation, lookup and retention
 */

import { v4 as uuidv4 } from 'uuid';
import { Crypto } from './crypto.js';
import type { SQLiteHiveStore } from './storage.js';
import type { TierAuthority } from './tier.js';
import type { Outbox } from './outbox.js';
import type { HiveConfig } from './config.js';
import { normalizeNodeKey } from './identity.js';
import type {
  Clock,
  NodePublicKey,
  Poll,
  PollStatus,
  PollType,
  PruneResult,
  RetentionPolicy,
  Timestamp,
} from './types.js';
import { POLL_TYPES, SPOIL, HiveError, ErrorCodes, errorMessage } from './types.js';

export const POLL_LIMITS = {
  minOptions: 2,
  maxOptions: 10,
  maxOptionLength: 64,
  maxTitleLength: 200,
  maxMetadataBytes: 8192,
} as const;

const SECONDS_PER_DAY = 86_400;

export interface CreatePollRequest {
  pollType: string;
  title: string;
  options: unknown;
  deadline: number;
  metadata?: unknown;
}

export function isPollType(value: unknown): value is PollType {
  return typeof value === 'string' && POLL_TYPES.some(t => t === value);
}

/**
 * Status is a function of the deadline alone
 */
export function computeStatus(poll: Pick<Poll, 'deadline'>, now: Timestamp): PollStatus {
  return now < poll.deadline ? 'active' : 'closed';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export class PollManager {
  constructor(
    private store: SQLiteHiveStore,
    private tiers: TierAuthority,
    private outbox: Outbox,
    private config: Readonly<HiveConfig>,
    private clock: Clock
  ) {}

  /**
   * Create a poll owned by `creator`, who must hold the governance tier
   */
  createPoll(creator: NodePublicKey, request: CreatePollRequest): Poll {
    const creatorKey = normalizeNodeKey(creator);

    const poll = this.store.transaction(() => {
      this.tiers.requireGovernance(creatorKey);
      const now = this.clock();
      const validated = this.validate(request, now);

      const created: Poll = {
        pollId: uuidv4(),
        ...validated,
        creator: creatorKey,
        createdAt: now,
      };

      this.store.insertPoll(created);
      this.outbox.enqueue('poll-create', { ...created });
      return created;
    });

    console.log(`[Poll] Created ${poll.pollType} poll ${poll.pollId} with ${poll.options.length} options`);

    try {
      this.prune({ maxPolls: this.config.maxPolls, maxVotes: this.config.maxVotes });
    } catch (error) {
      // The poll is already committed
      console.error(`[Poll] Auto-prune after creating ${poll.pollId} failed: ${errorMessage(error)}`);
    }
    return poll;
  }

  getPoll(pollId: string): Poll | null {
    return this.store.getPoll(pollId);
  }

  requirePoll(pollId: string): Poll {
    const poll = typeof pollId === 'string' ? this.store.getPoll(pollId) : null;
    if (!poll) {
      throw new HiveError(`Poll not found: ${pollId}`, ErrorCodes.POLL_NOT_FOUND, 404);
    }
    return poll;
  }

  getStatus(poll: Poll): PollStatus {
    return computeStatus(poll, this.clock());
  }

  /**
   * Remove closed polls (oldest deadline first) until the store is within
   * bounds, plus any closed poll older than `retentionDays`. Active polls
   * are never removed.
   */
  prune(policy: RetentionPolicy): PruneResult {
    const { maxPolls, maxVotes, retentionDays } = policy;
    if (!Number.isInteger(maxPolls) || maxPolls < 0 || !Number.isInteger(maxVotes) || maxVotes < 0) {
      throw new HiveError('Retention bounds must be non-negative integers', ErrorCodes.VALIDATION_ERROR);
    }
    if (retentionDays !== undefined && (!Number.isFinite(retentionDays) || retentionDays <= 0)) {
      throw new HiveError('retentionDays must be a positive number', ErrorCodes.VALIDATION_ERROR);
    }

    const result = this.store.transaction((): PruneResult => {
      const now = this.clock();
      let pollsRemoved = 0;
      let votesRemoved = 0;

      if (retentionDays !== undefined) {
        const cutoff = now - Math.floor(retentionDays * SECONDS_PER_DAY);
        for (const pollId of this.store.closedPollIdsBefore(cutoff, now)) {
          votesRemoved += this.store.deletePoll(pollId);
          pollsRemoved++;
        }
      }

      while (this.store.countPolls() > maxPolls || this.store.countVotes() > maxVotes) {
        const pollId = this.store.oldestClosedPollId(now);
        if (!pollId) break;
        votesRemoved += this.store.deletePoll(pollId);
        pollsRemoved++;
      }

      return { pollsRemoved, votesRemoved };
    });

    if (result.pollsRemoved > 0) {
      console.log(`[Poll] Pruned ${result.pollsRemoved} closed poll(s) and ${result.votesRemoved} vote(s)`);
    }
    return result;
  }

  private validate(
    request: CreatePollRequest,
    now: Timestamp
  ): Pick<Poll, 'pollType' | 'title' | 'options' | 'metadata' | 'deadline'> {
    if (!isPollType(request.pollType)) {
      throw new HiveError(
        `Poll type must be one of: ${POLL_TYPES.join(', ')}`,
        ErrorCodes.INVALID_POLL_TYPE
      );
    }

    const title = typeof request.title === 'string' ? request.title.trim() : '';
    if (!title) {
      throw new HiveError('Title is required', ErrorCodes.INVALID_TITLE);
    }
    if (title.length > POLL_LIMITS.maxTitleLength) {
      throw new HiveError(
        `Title exceeds ${POLL_LIMITS.maxTitleLength} characters`,
        ErrorCodes.METADATA_TOO_LARGE
      );
    }

    let metadata: Record<string, unknown> = {};
    if (request.metadata !== undefined && request.metadata !== null) {
      if (!isPlainObject(request.metadata)) {
        throw new HiveError('Metadata must be a JSON object', ErrorCodes.VALIDATION_ERROR);
      }
      metadata = request.metadata;
      if (Crypto.byteLength(Crypto.canonicalJson(metadata)) > POLL_LIMITS.maxMetadataBytes) {
        throw new HiveError(
          `Metadata exceeds ${POLL_LIMITS.maxMetadataBytes} bytes`,
          ErrorCodes.METADATA_TOO_LARGE
        );
      }
    }

    const options = this.validateOptions(request.options);

    if (!Number.isInteger(request.deadline) || request.deadline <= now) {
      throw new HiveError('Deadline must be an integer timestamp in the future', ErrorCodes.INVALID_DEADLINE);
    }

    return {
      pollType: request.pollType,
      title,
      options,
      metadata,
      deadline: request.deadline,
    };
  }

  private validateOptions(raw: unknown): string[] {
    if (!Array.isArray(raw)) {
      throw new HiveError('Options must be a list', ErrorCodes.INVALID_OPTIONS);
    }
    if (raw.length < POLL_LIMITS.minOptions || raw.length > POLL_LIMITS.maxOptions) {
      throw new HiveError(
        `Polls need between ${POLL_LIMITS.minOptions} and ${POLL_LIMITS.maxOptions} options`,
        ErrorCodes.INVALID_OPTION_COUNT
      );
    }

    const options: string[] = [];
    for (const value of raw) {
      const option = typeof value === 'string' ? value.trim() : '';
      if (!option) {
        throw new HiveError('Options must be non-empty strings', ErrorCodes.INVALID_OPTIONS);
      }
      if (option.length > POLL_LIMITS.maxOptionLength) {
        throw new HiveError(
          `Option exceeds ${POLL_LIMITS.maxOptionLength} characters`,
          ErrorCodes.INVALID_OPTIONS
        );
      }
      if (option.toLowerCase() === SPOIL) {
        throw new HiveError(`"${SPOIL}" is reserved and cannot be an option`, ErrorCodes.INVALID_OPTIONS);
      }
      if (options.includes(option)) {
        throw new HiveError(`Duplicate option: ${option}`, ErrorCodes.INVALID_OPTIONS);
      }
      options.push(option);
    }
    return options;
  }
}
