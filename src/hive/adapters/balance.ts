/**
 * Balance query
 * Reports how many sats a node actually holds, used to back bond claims.
 */

import type { NodePublicKey } from '../types.js';

export interface BalanceOracle {
  /**
   * Spendable balance in sats. Rejects when the balance cannot be determined.
   */
  getBalanceSats(nodePublicKey: NodePublicKey): Promise<number>;
}

/** One entry of a Lightning node's `listfunds` channel list */
export interface ChannelFunds {
  peerId: string;
  ourAmountMsat: number;
  state: string;
}

export type ListFunds = () => Promise<ChannelFunds[]>;

/**
 * Sums our side of every normal channel reported by the node
 */
export class ChannelFundsBalanceOracle implements BalanceOracle {
  constructor(private listFunds: ListFunds) {}

  async getBalanceSats(_nodePublicKey: NodePublicKey): Promise<number> {
    const channels = await this.listFunds();
    const msat = channels
      .filter(channel => channel.state === 'CHANNELD_NORMAL')
      .reduce((sum, channel) => sum + channel.ourAmountMsat, 0);
    return Math.floor(msat / 1000);
  }
}

/**
 * Fixed balances for testing and development
 */
export class MockBalanceOracle implements BalanceOracle {
  private balances = new Map<NodePublicKey, number>();
  private failure: Error | null = null;
  private delayMs = 0;

  constructor(private defaultBalance = 0) {}

  setBalance(nodePublicKey: NodePublicKey, sats: number): void {
    this.balances.set(nodePublicKey, sats);
  }

  /**
   * Make every query reject with `error` (null to clear)
   */
  setFailure(error: Error | null): void {
    this.failure = error;
  }

  setDelay(ms: number): void {
    this.delayMs = ms;
  }

  async getBalanceSats(nodePublicKey: NodePublicKey): Promise<number> {
    if (this.delayMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.delayMs));
    }
    if (this.failure) {
      throw this.failure;
    }
    return this.balances.get(nodePublicKey) ?? this.defaultBalance;
  }
}
