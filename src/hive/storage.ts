/**
 * Storage implementation using SQLite
 *
 * One connection per store instance. Methods are synchronous so managers can
 * compose them inside a single `transaction()`.
 */

import Database from 'better-sqlite3';
import { mkdirSync, existsSync, chmodSync } from 'fs';
import { dirname } from 'path';
import type {
  Binding,
  BindingKind,
  Did,
  DidHistoryEntry,
  GovernanceTier,
  Identity,
  NodePublicKey,
  OutboxEntry,
  OutboxOperation,
  OutboxStatus,
  Poll,
  PollType,
  Timestamp,
  Vote,
  VoteChoice,
} from './types.js';
import { SPOIL } from './types.js';

export const MEMORY_DB = ':memory:';

interface IdentityRow {
  node_public_key: string;
  did: string;
  generation: number;
  tier: GovernanceTier;
  bond_sats: number;
  bond_verified_at: number | null;
  created_at: number;
  updated_at: number;
}

interface DidHistoryRow {
  did: string;
  node_public_key: string;
  generation: number;
  created_at: number;
  superseded_at: number | null;
}

interface BindingRow {
  binding_id: string;
  did: string;
  node_public_key: string;
  kind: BindingKind;
  external_key: string;
  payload: string;
  signature: string;
  created_at: number;
  superseded_at: number | null;
}

interface PollRow {
  poll_id: string;
  poll_type: PollType;
  title: string;
  options: string;
  metadata: string;
  deadline: number;
  creator: string;
  created_at: number;
}

interface VoteRow {
  vote_id: string;
  poll_id: string;
  voter: string;
  choice_index: number | null;
  reason: string;
  signature: string;
  cast_at: number;
}

interface VoteWithPollRow extends VoteRow {
  title: string;
  poll_type: PollType;
  deadline: number;
}

interface OutboxRow {
  entry_id: string;
  operation: OutboxOperation;
  payload: string;
  attempts: number;
  next_attempt_at: number;
  status: OutboxStatus;
  last_error: string | null;
  created_at: number;
  updated_at: number;
}

interface CountRow {
  count: number;
}

export interface ChoiceCount {
  choice: VoteChoice;
  count: number;
}

export interface VoteWithPoll {
  vote: Vote;
  title: string;
  pollType: PollType;
  deadline: Timestamp;
}

export interface OutboxFailureUpdate {
  nextAttemptAt: Timestamp;
  status: OutboxStatus;
  lastError: string;
  updatedAt: Timestamp;
}

export class SQLiteHiveStore {
  private db: Database.Database;

  constructor(private readonly dbPath: string) {
    if (dbPath !== MEMORY_DB) {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true, mode: 0o700 });
      }
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('busy_timeout = 5000');
    this.initialize();
    this.restrictPermissions();
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS identities (
        node_public_key TEXT PRIMARY KEY,
        did TEXT NOT NULL UNIQUE,
        generation INTEGER NOT NULL DEFAULT 0,
        tier TEXT NOT NULL DEFAULT 'basic' CHECK (tier IN ('basic', 'governance')),
        bond_sats INTEGER NOT NULL DEFAULT 0 CHECK (bond_sats >= 0),
        bond_verified_at INTEGER,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS did_history (
        did TEXT PRIMARY KEY,
        node_public_key TEXT NOT NULL,
        generation INTEGER NOT NULL,
        created_at INTEGER NOT NULL,
        superseded_at INTEGER,
        FOREIGN KEY (node_public_key) REFERENCES identities(node_public_key)
      );

      CREATE INDEX IF NOT EXISTS idx_did_history_node ON did_history(node_public_key);

      CREATE TABLE IF NOT EXISTS bindings (
        binding_id TEXT PRIMARY KEY,
        did TEXT NOT NULL,
        node_public_key TEXT NOT NULL,
        kind TEXT NOT NULL CHECK (kind IN ('nostr', 'cln')),
        external_key TEXT NOT NULL,
        payload TEXT NOT NULL,
        signature TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        superseded_at INTEGER,
        FOREIGN KEY (node_public_key) REFERENCES identities(node_public_key)
      );

      CREATE INDEX IF NOT EXISTS idx_bindings_did ON bindings(did);
      CREATE INDEX IF NOT EXISTS idx_bindings_node_kind ON bindings(node_public_key, kind);

      CREATE TABLE IF NOT EXISTS polls (
        poll_id TEXT PRIMARY KEY,
        poll_type TEXT NOT NULL,
        title TEXT NOT NULL,
        options TEXT NOT NULL,
        metadata TEXT NOT NULL DEFAULT '{}',
        deadline INTEGER NOT NULL,
        creator TEXT NOT NULL,
        created_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_polls_deadline ON polls(deadline);

      CREATE TABLE IF NOT EXISTS votes (
        vote_id TEXT PRIMARY KEY,
        poll_id TEXT NOT NULL,
        voter TEXT NOT NULL,
        choice_index INTEGER,
        reason TEXT NOT NULL DEFAULT '',
        signature TEXT NOT NULL,
        cast_at INTEGER NOT NULL,
        FOREIGN KEY (poll_id) REFERENCES polls(poll_id) ON DELETE CASCADE,
        UNIQUE(poll_id, voter)
      );

      CREATE INDEX IF NOT EXISTS idx_votes_voter ON votes(voter, cast_at);

      CREATE TABLE IF NOT EXISTS outbox (
        entry_id TEXT PRIMARY KEY,
        operation TEXT NOT NULL,
        payload TEXT NOT NULL,
        attempts INTEGER NOT NULL DEFAULT 0,
        next_attempt_at INTEGER NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'abandoned')),
        last_error TEXT,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_outbox_due ON outbox(status, next_attempt_at);
    `);
  }

  /**
   * Owner-only permissions on the database and its WAL side files
   */
  private restrictPermissions(): void {
    if (this.dbPath === MEMORY_DB) return;
    for (const path of [this.dbPath, `${this.dbPath}-wal`, `${this.dbPath}-shm`]) {
      if (existsSync(path)) {
        chmodSync(path, 0o600);
      }
    }
  }

  /**
   * Run `fn` in one SQLite transaction. Nested calls become savepoints.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // Identity operations

  insertIdentity(identity: Identity): void {
    this.db.prepare(`
      INSERT INTO identities
      (node_public_key, did, generation, tier, bond_sats, bond_verified_at, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      identity.nodePublicKey,
      identity.did,
      identity.generation,
      identity.tier,
      identity.bondSats,
      identity.bondVerifiedAt,
      identity.createdAt,
      identity.updatedAt
    );
  }

  getIdentity(nodePublicKey: NodePublicKey): Identity | null {
    const row = this.db
      .prepare<[string], IdentityRow>('SELECT * FROM identities WHERE node_public_key = ?')
      .get(nodePublicKey);
    return row ? this.rowToIdentity(row) : null;
  }

  updateIdentityDid(nodePublicKey: NodePublicKey, did: Did, generation: number, updatedAt: Timestamp): void {
    this.db.prepare(
      'UPDATE identities SET did = ?, generation = ?, updated_at = ? WHERE node_public_key = ?'
    ).run(did, generation, updatedAt, nodePublicKey);
  }

  updateIdentityTier(
    nodePublicKey: NodePublicKey,
    tier: GovernanceTier,
    bondSats: number,
    bondVerifiedAt: Timestamp | null,
    updatedAt: Timestamp
  ): void {
    this.db.prepare(`
      UPDATE identities
      SET tier = ?, bond_sats = ?, bond_verified_at = ?, updated_at = ?
      WHERE node_public_key = ?
    `).run(tier, bondSats, bondVerifiedAt, updatedAt, nodePublicKey);
  }

  // DID history

  insertDidHistory(entry: DidHistoryEntry): void {
    this.db.prepare(`
      INSERT INTO did_history (did, node_public_key, generation, created_at, superseded_at)
      VALUES (?, ?, ?, ?, ?)
    `).run(entry.did, entry.nodePublicKey, entry.generation, entry.createdAt, entry.supersededAt);
  }

  getDidHistory(did: Did): DidHistoryEntry | null {
    const row = this.db
      .prepare<[string], DidHistoryRow>('SELECT * FROM did_history WHERE did = ?')
      .get(did);
    return row ? this.rowToDidHistory(row) : null;
  }

  listDidHistory(nodePublicKey: NodePublicKey): DidHistoryEntry[] {
    return this.db
      .prepare<[string], DidHistoryRow>(
        'SELECT * FROM did_history WHERE node_public_key = ? ORDER BY generation ASC'
      )
      .all(nodePublicKey)
      .map(row => this.rowToDidHistory(row));
  }

  supersedeDid(did: Did, at: Timestamp): void {
    this.db.prepare(
      'UPDATE did_history SET superseded_at = ? WHERE did = ? AND superseded_at IS NULL'
    ).run(at, did);
  }

  // Binding operations

  insertBinding(binding: Binding): void {
    this.db.prepare(`
      INSERT INTO bindings
      (binding_id, did, node_public_key, kind, external_key, payload, signature, created_at, superseded_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      binding.bindingId,
      binding.did,
      binding.nodePublicKey,
      binding.kind,
      binding.externalKey,
      binding.payload,
      binding.signature,
      binding.createdAt,
      binding.supersededAt
    );
  }

  /**
   * Supersede the current binding of `kind` for a node. Returns rows touched.
   */
  supersedeBindingsOfKind(nodePublicKey: NodePublicKey, kind: BindingKind, at: Timestamp): number {
    return this.db.prepare(`
      UPDATE bindings SET superseded_at = ?
      WHERE node_public_key = ? AND kind = ? AND superseded_at IS NULL
    `).run(at, nodePublicKey, kind).changes;
  }

  supersedeBindingsForDid(did: Did, at: Timestamp): number {
    return this.db.prepare(
      'UPDATE bindings SET superseded_at = ? WHERE did = ? AND superseded_at IS NULL'
    ).run(at, did).changes;
  }

  listBindings(did: Did, options?: { includeSuperseded?: boolean }): Binding[] {
    let query = 'SELECT * FROM bindings WHERE did = ?';
    if (!options?.includeSuperseded) {
      query += ' AND superseded_at IS NULL';
    }
    query += ' ORDER BY created_at ASC, rowid ASC';

    return this.db
      .prepare<[string], BindingRow>(query)
      .all(did)
      .map(row => this.rowToBinding(row));
  }

  // Poll operations

  insertPoll(poll: Poll): void {
    this.db.prepare(`
      INSERT INTO polls
      (poll_id, poll_type, title, options, metadata, deadline, creator, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      poll.pollId,
      poll.pollType,
      poll.title,
      JSON.stringify(poll.options),
      JSON.stringify(poll.metadata),
      poll.deadline,
      poll.creator,
      poll.createdAt
    );
  }

  getPoll(pollId: string): Poll | null {
    const row = this.db
      .prepare<[string], PollRow>('SELECT * FROM polls WHERE poll_id = ?')
      .get(pollId);
    return row ? this.rowToPoll(row) : null;
  }

  countPolls(): number {
    return this.count('SELECT COUNT(*) AS count FROM polls');
  }

  countActivePolls(now: Timestamp): number {
    return this.count('SELECT COUNT(*) AS count FROM polls WHERE deadline > ?', now);
  }

  /**
   * Oldest poll whose deadline has passed, by deadline then creation time
   */
  oldestClosedPollId(now: Timestamp): string | null {
    const row = this.db
      .prepare<[number], { poll_id: string }>(`
        SELECT poll_id FROM polls
        WHERE deadline <= ?
        ORDER BY deadline ASC, created_at ASC, rowid ASC
        LIMIT 1
      `)
      .get(now);
    return row ? row.poll_id : null;
  }

  closedPollIdsBefore(cutoff: Timestamp, now: Timestamp): string[] {
    return this.db
      .prepare<[number, number], { poll_id: string }>(`
        SELECT poll_id FROM polls
        WHERE deadline < ? AND deadline <= ?
        ORDER BY deadline ASC
      `)
      .all(cutoff, now)
      .map(row => row.poll_id);
  }

  /**
   * Delete a poll and, through the cascade, its votes. Returns votes removed.
   */
  deletePoll(pollId: string): number {
    const votes = this.countVotesForPoll(pollId);
    this.db.prepare('DELETE FROM polls WHERE poll_id = ?').run(pollId);
    return votes;
  }

  // Vote operations

  /**
   * Throws the driver's constraint error when (poll, voter) already voted
   */
  insertVote(vote: Vote): void {
    this.db.prepare(`
      INSERT INTO votes
      (vote_id, poll_id, voter, choice_index, reason, signature, cast_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(
      vote.voteId,
      vote.pollId,
      vote.voter,
      vote.choice === SPOIL ? null : vote.choice,
      vote.reason,
      vote.signature,
      vote.castAt
    );
  }

  listVotes(pollId: string): Vote[] {
    return this.db
      .prepare<[string], VoteRow>('SELECT * FROM votes WHERE poll_id = ? ORDER BY cast_at ASC, rowid ASC')
      .all(pollId)
      .map(row => this.rowToVote(row));
  }

  countVotes(): number {
    return this.count('SELECT COUNT(*) AS count FROM votes');
  }

  countVotesForPoll(pollId: string): number {
    return this.count('SELECT COUNT(*) AS count FROM votes WHERE poll_id = ?', pollId);
  }

  countVotesByVoter(voter: NodePublicKey): number {
    return this.count('SELECT COUNT(*) AS count FROM votes WHERE voter = ?', voter);
  }

  countChoices(pollId: string): ChoiceCount[] {
    return this.db
      .prepare<[string], { choice_index: number | null; count: number }>(`
        SELECT choice_index, COUNT(*) AS count FROM votes
        WHERE poll_id = ?
        GROUP BY choice_index
      `)
      .all(pollId)
      .map(row => ({
        choice: row.choice_index === null ? SPOIL : row.choice_index,
        count: row.count,
      }));
  }

  listVotesByVoter(voter: NodePublicKey, limit: number): VoteWithPoll[] {
    return this.db
      .prepare<[string, number], VoteWithPollRow>(`
        SELECT v.*, p.title, p.poll_type, p.deadline
        FROM votes v JOIN polls p ON p.poll_id = v.poll_id
        WHERE v.voter = ?
        ORDER BY v.cast_at DESC, v.rowid DESC
        LIMIT ?
      `)
      .all(voter, limit)
      .map(row => ({
        vote: this.rowToVote(row),
        title: row.title,
        pollType: row.poll_type,
        deadline: row.deadline,
      }));
  }

  // Outbox operations

  insertOutboxEntry(entry: OutboxEntry): void {
    this.db.prepare(`
      INSERT INTO outbox
      (entry_id, operation, payload, attempts, next_attempt_at, status, last_error, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      entry.entryId,
      entry.operation,
      JSON.stringify(entry.payload),
      entry.attempts,
      entry.nextAttemptAt,
      entry.status,
      entry.lastError,
      entry.createdAt,
      entry.updatedAt
    );
  }

  getOutboxEntry(entryId: string): OutboxEntry | null {
    const row = this.db
      .prepare<[string], OutboxRow>('SELECT * FROM outbox WHERE entry_id = ?')
      .get(entryId);
    return row ? this.rowToOutboxEntry(row) : null;
  }

  /**
   * Pending entries due at `now`, oldest first
   */
  dueOutboxEntries(now: Timestamp, limit: number): OutboxEntry[] {
    return this.db
      .prepare<[number, number], OutboxRow>(`
        SELECT * FROM outbox
        WHERE status = 'pending' AND next_attempt_at <= ?
        ORDER BY created_at ASC, rowid ASC
        LIMIT ?
      `)
      .all(now, limit)
      .map(row => this.rowToOutboxEntry(row));
  }

  listOutboxEntries(status?: OutboxStatus): OutboxEntry[] {
    const rows = status
      ? this.db
        .prepare<[string], OutboxRow>('SELECT * FROM outbox WHERE status = ? ORDER BY created_at ASC, rowid ASC')
        .all(status)
      : this.db
        .prepare<[], OutboxRow>('SELECT * FROM outbox ORDER BY created_at ASC, rowid ASC')
        .all();
    return rows.map(row => this.rowToOutboxEntry(row));
  }

  countOutboxEntries(status: OutboxStatus): number {
    return this.count('SELECT COUNT(*) AS count FROM outbox WHERE status = ?', status);
  }

  deleteOutboxEntry(entryId: string): boolean {
    return this.db.prepare('DELETE FROM outbox WHERE entry_id = ?').run(entryId).changes > 0;
  }

  /**
   * Take a due entry for delivery by moving its next attempt to `leaseUntil`.
   * False when another connection claimed it first.
   */
  claimOutboxEntry(entryId: string, now: Timestamp, leaseUntil: Timestamp): boolean {
    return this.db.prepare(`
      UPDATE outbox
      SET next_attempt_at = ?, updated_at = ?
      WHERE entry_id = ? AND status = 'pending' AND next_attempt_at <= ?
    `).run(leaseUntil, now, entryId, now).changes > 0;
  }

  /**
   * Count a failed attempt and return the new total, or null when the entry
   * is gone or no longer pending
   */
  incrementOutboxAttempts(entryId: string): number | null {
    const changes = this.db.prepare(
      "UPDATE outbox SET attempts = attempts + 1 WHERE entry_id = ? AND status = 'pending'"
    ).run(entryId).changes;
    if (changes === 0) return null;

    const row = this.db
      .prepare<[string], { attempts: number }>('SELECT attempts FROM outbox WHERE entry_id = ?')
      .get(entryId);
    return row ? row.attempts : null;
  }

  recordOutboxFailure(entryId: string, update: OutboxFailureUpdate): void {
    this.db.prepare(`
      UPDATE outbox
      SET next_attempt_at = ?, status = ?, last_error = ?, updated_at = ?
      WHERE entry_id = ?
    `).run(update.nextAttemptAt, update.status, update.lastError, update.updatedAt, entryId);
  }

  resetOutboxEntry(entryId: string, now: Timestamp): void {
    this.db.prepare(`
      UPDATE outbox
      SET status = 'pending', attempts = 0, next_attempt_at = ?, last_error = NULL, updated_at = ?
      WHERE entry_id = ?
    `).run(now, now, entryId);
  }

  /**
   * Delete abandoned entries last touched before `olderThan` (all when omitted)
   */
  deleteAbandonedEntries(olderThan?: Timestamp): number {
    if (olderThan === undefined) {
      return this.db.prepare("DELETE FROM outbox WHERE status = 'abandoned'").run().changes;
    }
    return this.db.prepare(
      "DELETE FROM outbox WHERE status = 'abandoned' AND updated_at < ?"
    ).run(olderThan).changes;
  }

  // Utilities

  private count(query: string, ...params: (string | number)[]): number {
    const row = this.db.prepare<(string | number)[], CountRow>(query).get(...params);
    return row ? row.count : 0;
  }

  private rowToIdentity(row: IdentityRow): Identity {
    return {
      nodePublicKey: row.node_public_key,
      did: row.did,
      generation: row.generation,
      tier: row.tier,
      bondSats: row.bond_sats,
      bondVerifiedAt: row.bond_verified_at,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  private rowToDidHistory(row: DidHistoryRow): DidHistoryEntry {
    return {
      did: row.did,
      nodePublicKey: row.node_public_key,
      generation: row.generation,
      createdAt: row.created_at,
      supersededAt: row.superseded_at,
    };
  }

  private rowToBinding(row: BindingRow): Binding {
    return {
      bindingId: row.binding_id,
      did: row.did,
      nodePublicKey: row.node_public_key,
      kind: row.kind,
      externalKey: row.external_key,
      payload: row.payload,
      signature: row.signature,
      createdAt: row.created_at,
      supersededAt: row.superseded_at,
    };
  }

  private rowToPoll(row: PollRow): Poll {
    return {
      pollId: row.poll_id,
      pollType: row.poll_type,
      title: row.title,
      options: parseStringArray(row.options),
      metadata: parseObject(row.metadata),
      deadline: row.deadline,
      creator: row.creator,
      createdAt: row.created_at,
    };
  }

  private rowToVote(row: VoteRow): Vote {
    return {
      voteId: row.vote_id,
      pollId: row.poll_id,
      voter: row.voter,
      choice: row.choice_index === null ? SPOIL : row.choice_index,
      reason: row.reason,
      signature: row.signature,
      castAt: row.cast_at,
    };
  }

  private rowToOutboxEntry(row: OutboxRow): OutboxEntry {
    return {
      entryId: row.entry_id,
      operation: row.operation,
      payload: parseObject(row.payload),
      attempts: row.attempts,
      nextAttemptAt: row.next_attempt_at,
      status: row.status,
      lastError: row.last_error,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  close(): void {
    this.db.close();
  }
}

function parseStringArray(text: string): string[] {
  const value: unknown = JSON.parse(text);
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function parseObject(text: string): Record<string, unknown> {
  const value: unknown = JSON.parse(text);
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return {};
  }
  return Object.fromEntries(Object.entries(value));
}

/**
 * True for the driver error raised by a UNIQUE constraint
 */
export function isUniqueViolation(error: unknown): boolean {
  // Matched by shape: the driver's error class may come from another realm
  return typeof error === 'object'
    && error !== null
    && 'code' in error
    && error.code === 'SQLITE_CONSTRAINT_UNIQUE';
}
