/**
 * Governance tier authority
 *
 * A node reaches the governance tier by claiming a bond that the balance
 * query confirms. Any doubt about the balance keeps the tier where it was.
 */

import type { SQLiteHiveStore } from './storage.js';
import type { BalanceOracle } from './adapters/balance.js';
import type { HiveConfig } from './config.js';
import { normalizeNodeKey } from './identity.js';
import type { Clock, GovernanceTier, Identity, NodePublicKey, Timestamp } from './types.js';
import { GOVERNANCE_TIERS, HiveError, ErrorCodes, errorMessage } from './types.js';

export interface TierResult {
  nodePublicKey: NodePublicKey;
  previousTier: GovernanceTier;
  tier: GovernanceTier;
  bondSats: number;
  bondVerifiedAt: Timestamp | null;
  /** Balance reported by the query, when one was made */
  balanceSats: number | null;
}

export function isGovernanceTier(tier: unknown): tier is GovernanceTier {
  return typeof tier === 'string' && GOVERNANCE_TIERS.some(t => t === tier);
}

/**
 * Reject if `promise` has not settled within `ms`
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, message?: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(message ?? `Operation timed out after ${ms}ms`));
    }, ms);

    promise
      .then(value => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch(err => {
        clearTimeout(timer);
        reject(err);
      });
  });
}

export class TierAuthority {
  constructor(
    private store: SQLiteHiveStore,
    private balance: BalanceOracle,
    private config: Readonly<HiveConfig>,
    private clock: Clock
  ) {}

  /**
   * Move a node to `targetTier`. `basic` is a voluntary demotion and needs
   * no balance check.
   */
  async upgrade(
    nodePublicKey: NodePublicKey,
    claimedBondSats: number,
    targetTier: string = 'governance'
  ): Promise<TierResult> {
    if (!isGovernanceTier(targetTier)) {
      throw new HiveError(`Unknown tier: ${targetTier}`, ErrorCodes.INVALID_TIER);
    }
    const key = normalizeNodeKey(nodePublicKey);
    const identity = this.requireIdentity(key);

    if (targetTier === 'basic') {
      return this.store.transaction((): TierResult => {
        const current = this.requireIdentity(key);
        const now = this.clock();
        this.store.updateIdentityTier(key, 'basic', 0, null, now);
        console.log('[Tier] Node stepped down to basic');
        return {
          nodePublicKey: key,
          previousTier: current.tier,
          tier: 'basic',
          bondSats: 0,
          bondVerifiedAt: null,
          balanceSats: null,
        };
      });
    }

    if (!Number.isSafeInteger(claimedBondSats) || claimedBondSats < 0) {
      throw new HiveError('Bond must be a non-negative integer amount of sats', ErrorCodes.VALIDATION_ERROR);
    }
    if (claimedBondSats < this.config.minBondSats) {
      throw new HiveError(
        `Bond of ${claimedBondSats} sats is below the minimum of ${this.config.minBondSats}`,
        ErrorCodes.INSUFFICIENT_BOND,
        403
      );
    }

    // Outside any transaction: the query may be slow or hang
    const balanceSats = await this.queryBalance(key);
    if (balanceSats < claimedBondSats) {
      console.warn(`[Tier] Bond claim of ${claimedBondSats} sats not backed by balance`);
      throw new HiveError(
        `Verified balance does not cover the claimed bond of ${claimedBondSats} sats`,
        ErrorCodes.BOND_VERIFICATION_FAILED,
        403
      );
    }

    return this.store.transaction((): TierResult => {
      this.requireIdentity(key);
      const now = this.clock();
      this.store.updateIdentityTier(key, 'governance', claimedBondSats, now, now);
      console.log(`[Tier] Node upgraded to governance with a ${claimedBondSats} sat bond`);
      return {
        nodePublicKey: key,
        previousTier: identity.tier,
        tier: 'governance',
        bondSats: claimedBondSats,
        bondVerifiedAt: now,
        balanceSats,
      };
    });
  }

  /**
   * Re-verify a governance node's balance, demoting it when the balance has
   * fallen below the minimum bond
   */
  async recheck(nodePublicKey: NodePublicKey): Promise<TierResult> {
    const key = normalizeNodeKey(nodePublicKey);
    const identity = this.requireIdentity(key);
    const balanceSats = await this.queryBalance(key);

    return this.store.transaction((): TierResult => {
      const current = this.requireIdentity(key);
      const now = this.clock();

      if (current.tier !== 'governance') {
        return this.toResult(current, identity.tier, balanceSats);
      }

      if (balanceSats < this.config.minBondSats) {
        this.store.updateIdentityTier(key, 'basic', 0, null, now);
        console.warn(`[Tier] Balance below minimum bond; demoted to basic`);
        return {
          nodePublicKey: key,
          previousTier: 'governance',
          tier: 'basic',
          bondSats: 0,
          bondVerifiedAt: null,
          balanceSats,
        };
      }

      const bondSats = Math.min(current.bondSats, balanceSats);
      this.store.updateIdentityTier(key, 'governance', bondSats, now, now);
      return {
        nodePublicKey: key,
        previousTier: 'governance',
        tier: 'governance',
        bondSats,
        bondVerifiedAt: now,
        balanceSats,
      };
    });
  }

  /**
   * Throws unless the node is provisioned and at governance tier. Safe to
   * call inside a transaction.
   */
  requireGovernance(nodePublicKey: NodePublicKey): Identity {
    const identity = this.requireIdentity(nodePublicKey.toLowerCase());
    if (identity.tier !== 'governance') {
      throw new HiveError('Governance tier required', ErrorCodes.INSUFFICIENT_TIER, 403);
    }
    return identity;
  }

  private requireIdentity(key: NodePublicKey): Identity {
    const identity = this.store.getIdentity(key);
    if (!identity) {
      throw new HiveError('Node identity has not been provisioned', ErrorCodes.IDENTITY_NOT_FOUND, 404);
    }
    return identity;
  }

  private async queryBalance(key: NodePublicKey): Promise<number> {
    let balanceSats: number;
    try {
      balanceSats = await withTimeout(
        this.balance.getBalanceSats(key),
        this.config.balanceQueryTimeoutMs,
        `Balance query timed out after ${this.config.balanceQueryTimeoutMs}ms`
      );
    } catch (error) {
      console.warn(`[Tier] Balance query failed: ${errorMessage(error)}`);
      throw new HiveError(
        `Bond verification failed: ${errorMessage(error)}`,
        ErrorCodes.BOND_VERIFICATION_FAILED,
        503
      );
    }

    if (!Number.isFinite(balanceSats) || balanceSats < 0) {
      throw new HiveError('Balance query returned an invalid amount', ErrorCodes.BOND_VERIFICATION_FAILED, 503);
    }
    return balanceSats;
  }

  private toResult(identity: Identity, previousTier: GovernanceTier, balanceSats: number | null): TierResult {
    return {
      nodePublicKey: identity.nodePublicKey,
      previousTier,
      tier: identity.tier,
      bondSats: identity.bondSats,
      bondVerifiedAt: identity.bondVerifiedAt,
      balanceSats,
    };
  }
}
