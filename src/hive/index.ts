/**
 * Hive Governance
 * Node identity, stake-gated tiers and signed polls for a peer fleet
 */

import { createConfig, loadConfig } from './config.js';
import type { HiveConfig } from './config.js';
import { SQLiteHiveStore, MEMORY_DB } from './storage.js';
import { IdentityManager } from './identity.js';
import { TierAuthority } from './tier.js';
import type { TierResult } from './tier.js';
import { PollManager } from './poll.js';
import type { CreatePollRequest } from './poll.js';
import { VoteManager, parseChoice } from './vote.js';
import { TallyManager } from './tally.js';
import type { PollStatusReport } from './tally.js';
import { Outbox } from './outbox.js';
import type { BreakerState } from './outbox.js';
import { Secp256k1Signer, MockSigner, callSigner } from './adapters/signer.js';
import type { SignerAdapter } from './adapters/signer.js';
import { ChannelFundsBalanceOracle, MockBalanceOracle } from './adapters/balance.js';
import type { BalanceOracle } from './adapters/balance.js';
import { HttpCoordinatorClient, MockCoordinatorClient } from './adapters/coordinator.js';
import type { CoordinatorClient } from './adapters/coordinator.js';
import type {
  Binding,
  BindingKind,
  Clock,
  DrainSummary,
  GovernanceTier,
  Identity,
  NodePublicKey,
  OutboxEntry,
  OutboxStatus,
  Poll,
  PruneResult,
  Signature,
  Timestamp,
  Vote,
  VoteSummary,
} from './types.js';
import { HiveError, ErrorCodes } from './types.js';

export const MAX_SIGN_MESSAGE_LENGTH = 4096;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export interface HiveOptions {
  config: Readonly<HiveConfig>;
  signer: SignerAdapter;
  balance: BalanceOracle;
  /** Only used when network sync is enabled */
  coordinator?: CoordinatorClient;
  store?: SQLiteHiveStore;
  clock?: Clock;
  /** Jitter source for outbox backoff */
  random?: () => number;
}

export interface NodeStatus {
  nodePublicKey: NodePublicKey;
  identity: Identity | null;
  tier: GovernanceTier | null;
  bindings: Binding[];
  bindingCounts: Record<BindingKind, number>;
  polls: { total: number; active: number };
  votes: { total: number; cast: number };
  sync: {
    networkEnabled: boolean;
    coordinatorUrl: string | null;
    pending: number;
    abandoned: number;
    breaker: BreakerState;
  };
}

export interface SignedMessage {
  message: string;
  signature: Signature;
  nodePublicKey: NodePublicKey;
}

/**
 * Main class - wires the managers around one store and acts for the local
 * node, whose key is the signer's
 */
export class HiveGovernance {
  readonly config: Readonly<HiveConfig>;
  readonly store: SQLiteHiveStore;
  readonly signer: SignerAdapter;
  readonly balance: BalanceOracle;
  readonly clock: Clock;

  readonly outbox: Outbox;
  readonly identities: IdentityManager;
  readonly tiers: TierAuthority;
  readonly polls: PollManager;
  readonly votes: VoteManager;
  readonly tallies: TallyManager;

  constructor(options: HiveOptions) {
    this.config = options.config;
    this.signer = options.signer;
    this.balance = options.balance;
    this.clock = options.clock ?? systemClock;
    this.store = options.store ?? new SQLiteHiveStore(this.config.dbPath);

    const coordinator = this.config.networkEnabled
      ? options.coordinator ?? this.createCoordinatorClient()
      : null;

    this.outbox = new Outbox(this.store, coordinator, this.config, this.clock, options.random);
    this.identities = new IdentityManager(this.store, this.signer, this.outbox, this.clock);
    this.tiers = new TierAuthority(this.store, this.balance, this.config, this.clock);
    this.polls = new PollManager(this.store, this.tiers, this.outbox, this.config, this.clock);
    this.votes = new VoteManager(this.store, this.polls, this.tiers, this.signer, this.outbox, this.clock);
    this.tallies = new TallyManager(this.store, this.polls);
  }

  async getNodePublicKey(): Promise<NodePublicKey> {
    const key = await callSigner(() => this.signer.getNodePublicKey());
    return key.toLowerCase();
  }

  // ============= Identity =============

  async provisionIdentity(options?: { reprovision?: boolean }): Promise<Identity> {
    return this.identities.provision(await this.getNodePublicKey(), options);
  }

  async status(): Promise<NodeStatus> {
    const nodePublicKey = await this.getNodePublicKey();
    const identity = this.identities.get(nodePublicKey);
    const bindings = identity ? this.store.listBindings(identity.did) : [];
    const now = this.clock();

    const bindingCounts: Record<BindingKind, number> = { nostr: 0, cln: 0 };
    for (const binding of bindings) {
      bindingCounts[binding.kind]++;
    }

    return {
      nodePublicKey,
      identity,
      tier: identity ? identity.tier : null,
      bindings,
      bindingCounts,
      polls: {
        total: this.store.countPolls(),
        active: this.store.countActivePolls(now),
      },
      votes: {
        total: this.store.countVotes(),
        cast: this.store.countVotesByVoter(nodePublicKey),
      },
      sync: {
        networkEnabled: this.outbox.isEnabled(),
        coordinatorUrl: this.config.coordinatorUrl || null,
        pending: this.store.countOutboxEntries('pending'),
        abandoned: this.store.countOutboxEntries('abandoned'),
        breaker: this.outbox.getBreaker().getState(),
      },
    };
  }

  /**
   * Bind an external key to the node's current DID. For `cln` the key
   * defaults to the node's own public key.
   */
  async bind(kind: BindingKind, externalKey?: string): Promise<Binding> {
    const nodePublicKey = await this.getNodePublicKey();
    const identity = this.requireOwnIdentity(nodePublicKey);
    const key = externalKey ?? (kind === 'cln' ? nodePublicKey : '');
    return this.identities.bind(identity.did, kind, key);
  }

  // ============= Tiers =============

  async upgrade(claimedBondSats: number, targetTier?: string): Promise<TierResult> {
    return this.tiers.upgrade(await this.getNodePublicKey(), claimedBondSats, targetTier);
  }

  async recheckTier(): Promise<TierResult> {
    return this.tiers.recheck(await this.getNodePublicKey());
  }

  // ============= Signing =============

  async signMessage(message: string): Promise<SignedMessage> {
    if (typeof message !== 'string' || message.length === 0) {
      throw new HiveError('Message is required', ErrorCodes.VALIDATION_ERROR);
    }
    if (message.length > MAX_SIGN_MESSAGE_LENGTH) {
      throw new HiveError(
        `Message exceeds ${MAX_SIGN_MESSAGE_LENGTH} characters`,
        ErrorCodes.VALIDATION_ERROR
      );
    }
    const nodePublicKey = await this.getNodePublicKey();
    const signature = await callSigner(() => this.signer.signMessage(message));
    return { message, signature, nodePublicKey };
  }

  // ============= Polls & votes =============

  async createPoll(request: CreatePollRequest): Promise<Poll> {
    return this.polls.createPoll(await this.getNodePublicKey(), request);
  }

  pollStatus(pollId: string): PollStatusReport {
    return this.tallies.pollStatus(pollId);
  }

  /**
   * Sign and cast the node's own vote. `choice` may be option text, an
   * option index or "spoil".
   */
  async vote(pollId: string, choice: unknown, reason = ''): Promise<Vote> {
    const voter = await this.getNodePublicKey();
    const poll = this.polls.requirePoll(pollId);
    const parsed = parseChoice(poll, choice);
    const payload = VoteManager.payloadFor(poll.pollId, voter, parsed, reason);
    const signature = await callSigner(() => this.signer.signMessage(payload));

    return this.votes.castVote({ pollId: poll.pollId, voter, choice: parsed, reason, signature });
  }

  async myVotes(limit?: number): Promise<VoteSummary[]> {
    return this.votes.myVotes(await this.getNodePublicKey(), limit);
  }

  prune(retentionDays?: number): PruneResult {
    return this.polls.prune({
      maxPolls: this.config.maxPolls,
      maxVotes: this.config.maxVotes,
      retentionDays,
    });
  }

  // ============= Outbox =============

  processOutbox(): Promise<DrainSummary> {
    return this.outbox.drain();
  }

  listOutbox(status?: OutboxStatus): OutboxEntry[] {
    return this.outbox.list(status);
  }

  retryOutboxEntry(entryId: string): OutboxEntry {
    return this.outbox.retry(entryId);
  }

  pruneOutbox(olderThan?: Timestamp): number {
    return this.outbox.pruneAbandoned(olderThan);
  }

  close(): void {
    this.store.close();
  }

  // ============= Private Methods =============

  private requireOwnIdentity(nodePublicKey: NodePublicKey): Identity {
    const identity = this.identities.get(nodePublicKey);
    if (!identity) {
      throw new HiveError(
        'Node identity has not been provisioned; call provision-identity first',
        ErrorCodes.IDENTITY_NOT_FOUND,
        404
      );
    }
    return identity;
  }

  private createCoordinatorClient(): CoordinatorClient {
    return new HttpCoordinatorClient({
      baseUrl: this.config.coordinatorUrl,
      token: this.config.coordinatorToken,
      timeout: this.config.delivery.requestTimeoutMs,
    });
  }
}

/**
 * Create a node from environment configuration. The development signer
 * reads its key from HIVE_NODE_PRIVATE_KEY.
 */
export function createHiveGovernance(options: Partial<HiveOptions> = {}): HiveGovernance {
  const config = options.config ?? loadConfig();

  let signer = options.signer;
  if (!signer) {
    const privateKey = process.env.HIVE_NODE_PRIVATE_KEY;
    if (!privateKey) {
      console.warn('[Hive] HIVE_NODE_PRIVATE_KEY not set; using an ephemeral signing key');
    }
    signer = new Secp256k1Signer(privateKey || undefined);
  }

  const balance = options.balance ?? new ChannelFundsBalanceOracle(async () => {
    throw new Error('No channel balance source configured');
  });

  if (!config.networkEnabled) {
    console.log('[Hive] Network sync disabled');
  }

  return new HiveGovernance({ ...options, config, signer, balance });
}

/**
 * Create an in-memory node with mock adapters for testing
 */
export function createTestHiveGovernance(options: {
  config?: Parameters<typeof createConfig>[0];
  signer?: SignerAdapter;
  balance?: BalanceOracle;
  coordinator?: CoordinatorClient;
  clock?: Clock;
  random?: () => number;
} = {}): HiveGovernance {
  const config = createConfig({ dbPath: MEMORY_DB, ...options.config });

  return new HiveGovernance({
    config,
    signer: options.signer ?? new MockSigner(),
    balance: options.balance ?? new MockBalanceOracle(),
    coordinator: options.coordinator ?? new MockCoordinatorClient(),
    clock: options.clock,
    random: options.random ?? (() => 0),
  });
}

// Re-export types and utilities
export { Crypto } from './crypto.js';
export type * from './types.js';
export { HiveError, ErrorCodes, isHiveError, errorMessage, SPOIL } from './types.js';
export { createConfig, loadConfig, isValidCoordinatorUrl, type HiveConfig, type DeliveryConfig } from './config.js';
export { SQLiteHiveStore, MEMORY_DB, isUniqueViolation } from './storage.js';
export { IdentityManager, type IdentityStatus } from './identity.js';
export { TierAuthority, type TierResult } from './tier.js';
export { PollManager, computeStatus, POLL_LIMITS, type CreatePollRequest } from './poll.js';
export { VoteManager, parseChoice, type CastVoteRequest } from './vote.js';
export { TallyManager, type PollStatusReport } from './tally.js';
export { Outbox, DeliveryBreaker, computeBackoff, type BreakerState } from './outbox.js';
export { assertRoutableHost, isPublicAddress, BlockedAddressError, type HostResolver } from './netguard.js';
export {
  Secp256k1Signer,
  MockSigner,
  type SignerAdapter,
} from './adapters/signer.js';
export {
  ChannelFundsBalanceOracle,
  MockBalanceOracle,
  type BalanceOracle,
  type ChannelFunds,
} from './adapters/balance.js';
export {
  HttpCoordinatorClient,
  MockCoordinatorClient,
  CoordinatorError,
  type CoordinatorClient,
} from './adapters/coordinator.js';
