/**
 * RPC dispatch
 *
 * Maps method names from the host process onto the node's operations. Every
 * call answers with either a result or a structured error carrying a stable
 * error kind; nothing is thrown back to the host.
 */

import type { HiveGovernance } from './index.js';
import type { ErrorCode, OutboxStatus } from './types.js';
import { HiveError, ErrorCodes, isHiveError, errorMessage } from './types.js';

export type RpcParams = Record<string, unknown>;

export interface RpcSuccess {
  ok: true;
  result: unknown;
}

export interface RpcFailure {
  ok: false;
  error: { kind: ErrorCode; message: string };
  /** HTTP-style status for hosts that speak HTTP */
  statusCode: number;
}

export type RpcResponse = RpcSuccess | RpcFailure;

export const RPC_METHODS = [
  'provision-identity',
  'status',
  'bind-nostr',
  'bind-cln',
  'upgrade',
  'tier-recheck',
  'sign-message',
  'poll-create',
  'poll-status',
  'vote',
  'my-votes',
  'prune',
  'process-outbox',
  'outbox-list',
  'outbox-retry',
  'outbox-prune',
] as const;

export type RpcMethod = typeof RPC_METHODS[number];

type Handler = (params: RpcParams) => Promise<unknown> | unknown;

export function isRpcMethod(method: string): method is RpcMethod {
  return RPC_METHODS.some(m => m === method);
}

// ============= Parameter readers =============

function invalid(message: string): HiveError {
  return new HiveError(message, ErrorCodes.VALIDATION_ERROR);
}

function requireString(params: RpcParams, name: string): string {
  const value = params[name];
  if (typeof value !== 'string' || value.length === 0) {
    throw invalid(`Parameter "${name}" must be a non-empty string`);
  }
  return value;
}

function optionalString(params: RpcParams, name: string): string | undefined {
  const value = params[name];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw invalid(`Parameter "${name}" must be a string`);
  }
  return value;
}

function optionalInteger(params: RpcParams, name: string): number | undefined {
  const value = params[name];
  if (value === undefined || value === null) return undefined;
  const parsed = typeof value === 'string' && /^-?\d+$/.test(value.trim())
    ? parseInt(value, 10)
    : value;
  if (typeof parsed !== 'number' || !Number.isInteger(parsed)) {
    throw invalid(`Parameter "${name}" must be an integer`);
  }
  return parsed;
}

function requireInteger(params: RpcParams, name: string): number {
  const value = optionalInteger(params, name);
  if (value === undefined) {
    throw invalid(`Parameter "${name}" is required`);
  }
  return value;
}

function optionalNumber(params: RpcParams, name: string): number | undefined {
  const value = params[name];
  if (value === undefined || value === null) return undefined;
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
    throw invalid(`Parameter "${name}" must be a number`);
  }
  return parsed;
}

function optionalBoolean(params: RpcParams, name: string): boolean | undefined {
  const value = params[name];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw invalid(`Parameter "${name}" must be a boolean`);
}

function optionalOutboxStatus(params: RpcParams): OutboxStatus | undefined {
  const status = optionalString(params, 'status');
  if (status === undefined || status === 'pending' || status === 'abandoned') {
    return status;
  }
  throw invalid('Parameter "status" must be "pending" or "abandoned"');
}

export class RpcDispatcher {
  private handlers: Record<RpcMethod, Handler>;

  constructor(private hive: HiveGovernance) {
    this.handlers = {
      'provision-identity': (p) => this.hive.provisionIdentity({
        reprovision: optionalBoolean(p, 'reprovision') ?? false,
      }),
      'status': () => this.hive.status(),
      'bind-nostr': (p) => this.hive.bind('nostr', requireString(p, 'pubkey')),
      'bind-cln': (p) => this.hive.bind('cln', optionalString(p, 'pubkey')),
      'upgrade': (p) => {
        const targetTier = optionalString(p, 'targetTier') ?? 'governance';
        const bondSats = targetTier === 'basic'
          ? optionalInteger(p, 'bondSats') ?? 0
          : requireInteger(p, 'bondSats');
        return this.hive.upgrade(bondSats, targetTier);
      },
      'tier-recheck': () => this.hive.recheckTier(),
      'sign-message': (p) => this.hive.signMessage(requireString(p, 'message')),
      'poll-create': (p) => this.hive.createPoll({
        pollType: requireString(p, 'type'),
        title: requireString(p, 'title'),
        options: p.options,
        deadline: requireInteger(p, 'deadline'),
        metadata: p.metadata,
      }),
      'poll-status': (p) => this.hive.pollStatus(requireString(p, 'pollId')),
      'vote': (p) => {
        const choice = p.choice;
        if (typeof choice !== 'string' && typeof choice !== 'number') {
          throw new HiveError('Parameter "choice" must be option text, an index or "spoil"', ErrorCodes.INVALID_CHOICE);
        }
        return this.hive.vote(requireString(p, 'pollId'), choice, optionalString(p, 'reason') ?? '');
      },
      'my-votes': (p) => this.hive.myVotes(optionalInteger(p, 'limit')),
      'prune': (p) => this.hive.prune(optionalNumber(p, 'retentionDays')),
      'process-outbox': () => this.hive.processOutbox(),
      'outbox-list': (p) => this.hive.listOutbox(optionalOutboxStatus(p)),
      'outbox-retry': (p) => this.hive.retryOutboxEntry(requireString(p, 'entryId')),
      'outbox-prune': (p) => ({ removed: this.hive.pruneOutbox(optionalInteger(p, 'olderThan')) }),
    };
  }

  async dispatch(method: string, params: RpcParams = {}): Promise<RpcResponse> {
    if (!isRpcMethod(method)) {
      return {
        ok: false,
        error: { kind: ErrorCodes.UNKNOWN_METHOD, message: `Unknown method: ${method}` },
        statusCode: 404,
      };
    }

    try {
      const result = await this.handlers[method](params);
      return { ok: true, result };
    } catch (error) {
      if (isHiveError(error)) {
        return {
          ok: false,
          error: { kind: error.code, message: error.message },
          statusCode: error.statusCode,
        };
      }
      console.error(`[RPC] ${method} failed:`, errorMessage(error));
      return {
        ok: false,
        error: { kind: ErrorCodes.INTERNAL_ERROR, message: errorMessage(error) },
        statusCode: 500,
      };
    }
  }
}
