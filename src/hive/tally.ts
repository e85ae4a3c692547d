/**
 * Tallying
 * Counts are recomputed from persisted votes on every call.
 */

import type { SQLiteHiveStore } from './storage.js';
import type { PollManager } from './poll.js';
import type { NodePublicKey, Poll, PollStatus, Tally } from './types.js';
import { SPOIL } from './types.js';

export interface PollStatusReport {
  poll: Poll;
  status: PollStatus;
  tally: Tally;
  voters: NodePublicKey[];
}

export class TallyManager {
  constructor(
    private store: SQLiteHiveStore,
    private polls: PollManager
  ) {}

  /**
   * Per-option counts keyed by option text. Works for active and closed polls.
   */
  tally(pollId: string): Tally {
    const poll = this.polls.requirePoll(pollId);
    return this.store.transaction(() => this.countFor(poll));
  }

  pollStatus(pollId: string): PollStatusReport {
    const poll = this.polls.requirePoll(pollId);
    return this.store.transaction(() => ({
      poll,
      status: this.polls.getStatus(poll),
      tally: this.countFor(poll),
      voters: this.store.listVotes(poll.pollId).map(vote => vote.voter),
    }));
  }

  private countFor(poll: Poll): Tally {
    // Own data properties, so an option named like an Object.prototype key still counts
    const perOptionCount: Record<string, number> = Object.fromEntries(poll.options.map(option => [option, 0]));

    let spoiledCount = 0;
    for (const { choice, count } of this.store.countChoices(poll.pollId)) {
      if (choice === SPOIL) {
        spoiledCount += count;
        continue;
      }
      const option = poll.options[choice];
      if (option !== undefined) {
        perOptionCount[option] += count;
      } else {
        console.warn(`[Tally] Poll ${poll.pollId} has ${count} vote(s) for unknown option ${choice}`);
      }
    }

    return {
      pollId: poll.pollId,
      perOptionCount,
      spoiledCount,
      totalVoters: this.store.countVotesForPoll(poll.pollId),
    };
  }
}
