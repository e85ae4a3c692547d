/**
 * Hive Governance Core Types
 * Node identity, stake-gated tiers, polls and ballots, outbox delivery
 */

// Cryptographic primitives
export type NodePublicKey = string; // hex-encoded 33-byte compressed secp256k1 point
export type Signature = string;     // hex-encoded compact signature
export type Hash = string;          // hex-encoded 32 bytes
export type Did = string;           // did:cid:b...

/** Unix seconds */
export type Timestamp = number;

export type Clock = () => Timestamp;

// Governance tiers
export const GOVERNANCE_TIERS = ['basic', 'governance'] as const;
export type GovernanceTier = typeof GOVERNANCE_TIERS[number];

export interface Identity {
  nodePublicKey: NodePublicKey;
  did: Did;
  generation: number;
  tier: GovernanceTier;
  bondSats: number;
  bondVerifiedAt: Timestamp | null;
  createdAt: Timestamp;
  updatedAt: Timestamp;
}

export interface DidHistoryEntry {
  did: Did;
  nodePublicKey: NodePublicKey;
  generation: number;
  createdAt: Timestamp;
  supersededAt: Timestamp | null;
}

// Bindings attest that a DID controls a key in another namespace
export const BINDING_KINDS = ['nostr', 'cln'] as const;
export type BindingKind = typeof BINDING_KINDS[number];

export interface Binding {
  bindingId: string;
  did: Did;
  nodePublicKey: NodePublicKey;
  kind: BindingKind;
  externalKey: string;
  /** Canonical attestation text that was signed */
  payload: string;
  signature: Signature;
  createdAt: Timestamp;
  supersededAt: Timestamp | null;
}

// Polls
export const POLL_TYPES = ['expansion', 'ban', 'generic'] as const;
export type PollType = typeof POLL_TYPES[number];

/** Derived from the deadline, never stored */
export type PollStatus = 'active' | 'closed';

export interface Poll {
  pollId: string;
  pollType: PollType;
  title: string;
  options: string[];
  metadata: Record<string, unknown>;
  deadline: Timestamp;
  creator: NodePublicKey;
  createdAt: Timestamp;
}

export const SPOIL = 'spoil' as const;
export type VoteChoice = number | typeof SPOIL;

export interface Vote {
  voteId: string;
  pollId: string;
  voter: NodePublicKey;
  choice: VoteChoice;
  reason: string;
  signature: Signature;
  castAt: Timestamp;
}

export interface VoteSummary extends Vote {
  title: string;
  pollType: PollType;
  deadline: Timestamp;
  status: PollStatus;
}

export interface Tally {
  pollId: string;
  perOptionCount: Record<string, number>;
  spoiledCount: number;
  totalVoters: number;
}

export interface RetentionPolicy {
  maxPolls: number;
  maxVotes: number;
  /** Also drop closed polls whose deadline is older than this */
  retentionDays?: number;
}

export interface PruneResult {
  pollsRemoved: number;
  votesRemoved: number;
}

// Outbox
export const OUTBOX_OPERATIONS = ['identity-generate', 'poll-create', 'vote-sync'] as const;
export type OutboxOperation = typeof OUTBOX_OPERATIONS[number];

/** Delivered entries are deleted, so they never show up with a status */
export type OutboxStatus = 'pending' | 'abandoned';

export interface OutboxEntry {
  entryId: string;
  operation: OutboxOperation;
  payload: Record<string, unknown>;
  attempts: number;
  nextAttemptAt: Timestamp;
  status: OutboxStatus;
  lastError: string | null;
  createdAt: Timestamp;
  updatedAt: Timestamp;
}

export interface DrainSummary {
  processed: number;
  succeeded: number;
  failed: number;
  abandoned: number;
  breakerOpen: boolean;
}

// Error types
export class HiveError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public statusCode: number = 400
  ) {
    super(message);
    this.name = 'HiveError';
  }
}

export const ErrorCodes = {
  // Validation
  INVALID_KEY_FORMAT: 'InvalidKeyFormat',
  INVALID_DID: 'InvalidDid',
  UNKNOWN_BINDING_KIND: 'UnknownBindingKind',
  INVALID_EXTERNAL_KEY_FORMAT: 'InvalidExternalKeyFormat',
  INVALID_TIER: 'InvalidTier',
  INVALID_POLL_TYPE: 'InvalidPollType',
  INVALID_TITLE: 'InvalidTitle',
  INVALID_OPTION_COUNT: 'InvalidOptionCount',
  INVALID_OPTIONS: 'InvalidOptions',
  INVALID_DEADLINE: 'InvalidDeadline',
  METADATA_TOO_LARGE: 'MetadataTooLarge',
  INVALID_CHOICE: 'InvalidChoice',
  REASON_TOO_LONG: 'ReasonTooLong',
  INVALID_SIGNATURE: 'InvalidSignature',
  VALIDATION_ERROR: 'ValidationError',
  // Authorization
  INSUFFICIENT_TIER: 'InsufficientTier',
  INSUFFICIENT_BOND: 'InsufficientBond',
  FOREIGN_IDENTITY: 'ForeignIdentity',
  STALE_DID: 'StaleDid',
  // Lookup
  IDENTITY_NOT_FOUND: 'IdentityNotFound',
  POLL_NOT_FOUND: 'PollNotFound',
  OUTBOX_ENTRY_NOT_FOUND: 'OutboxEntryNotFound',
  UNKNOWN_METHOD: 'UnknownMethod',
  // State / conflict
  POLL_CLOSED: 'PollClosed',
  DUPLICATE_VOTE: 'DuplicateVote',
  // External dependencies
  SIGNER_UNAVAILABLE: 'SignerUnavailable',
  BOND_VERIFICATION_FAILED: 'BondVerificationFailed',
  INTERNAL_ERROR: 'InternalError',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export function isHiveError(error: unknown): error is HiveError {
  return error instanceof HiveError;
}

/**
 * Human-readable error text for logs and error summaries, cut to `max` chars
 */
export function errorMessage(error: unknown, max = 200): string {
  const text = error instanceof Error ? error.message : String(error);
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}
