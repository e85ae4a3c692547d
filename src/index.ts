/**
 * Hive Governance - node identity and stake-gated voting for a peer fleet
 *
 * Identity derives a DID from each node's key.
 * Tiers gate governance on a verified bond.
 * Polls collect one signed vote per node key.
 * The outbox mirrors it all to an optional coordinator.
 */

export {
  HiveGovernance,
  createHiveGovernance,
  createTestHiveGovernance,
  systemClock,
  Crypto,
  HiveError,
  ErrorCodes,
  isHiveError,
  SPOIL,
  createConfig,
  loadConfig,
  SQLiteHiveStore,
  IdentityManager,
  TierAuthority,
  PollManager,
  VoteManager,
  TallyManager,
  Outbox,
  DeliveryBreaker,
  Secp256k1Signer,
  MockSigner,
  ChannelFundsBalanceOracle,
  MockBalanceOracle,
  HttpCoordinatorClient,
  MockCoordinatorClient,
} from './hive/index.js';

export { RpcDispatcher, RPC_METHODS } from './hive/rpc.js';

export type {
  Identity,
  Binding,
  BindingKind,
  DidHistoryEntry,
  GovernanceTier,
  Poll,
  PollStatus,
  PollType,
  Vote,
  VoteChoice,
  VoteSummary,
  Tally,
  OutboxEntry,
  OutboxStatus,
  DrainSummary,
  RetentionPolicy,
  PruneResult,
  HiveConfig,
  HiveOptions,
  NodeStatus,
  SignerAdapter,
  BalanceOracle,
  CoordinatorClient,
} from './hive/index.js';

export type { RpcResponse, RpcParams, RpcMethod } from './hive/rpc.js';
