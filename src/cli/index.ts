#!/usr/bin/env node

/**
 * Hive Governance CLI
 * Runs one RPC method against the local store and prints the JSON response
 */

import { createHiveGovernance } from '../hive/index.js';
import { RpcDispatcher, RPC_METHODS, type RpcParams } from '../hive/rpc.js';

export interface ParsedArgs {
  method: string | null;
  params: RpcParams;
}

/**
 * `<method> [--name value]... [--json '{...}']`. Values that parse as JSON
 * (numbers, booleans, arrays, objects) are taken as such; anything else is a
 * string. A bare `--flag` is `true`.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const [method, ...rest] = argv;
  let params: RpcParams = {};

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (!arg.startsWith('--')) {
      throw new Error(`Unexpected argument: ${arg}`);
    }
    const name = arg.slice(2);
    const next = rest[i + 1];
    const value = next === undefined || next.startsWith('--') ? 'true' : next;
    if (value === next) i++;

    if (name === 'json') {
      const parsed: unknown = JSON.parse(value);
      if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
        throw new Error('--json must be a JSON object');
      }
      params = { ...params, ...Object.fromEntries(Object.entries(parsed)) };
    } else {
      params[name] = parseValue(value);
    }
  }

  return { method: method && method !== 'help' ? method : null, params };
}

function parseValue(value: string): unknown {
  // Keep long digit strings (keys, ids) as text
  if (/^[0-9a-f]{16,}$/i.test(value)) return value;
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

function showHelp() {
  console.log(`Usage: hive-gov <method> [--param value]...

Methods:
  ${RPC_METHODS.join('\n  ')}

Examples:
  hive-gov provision-identity
  hive-gov bind-nostr --pubkey <64 hex>
  hive-gov upgrade --bondSats 100000
  hive-gov poll-create --type generic --title "Open a channel?" --options '["yes","no"]' --deadline 1767225600
  hive-gov vote --pollId <id> --choice yes --reason "good peer"
  hive-gov process-outbox

Environment:
  HIVE_DB_PATH, HIVE_COORDINATOR_URL, HIVE_NETWORK_ENABLED, HIVE_COORDINATOR_TOKEN,
  HIVE_MIN_BOND_SATS, HIVE_NODE_PRIVATE_KEY
`);
}

async function main() {
  const { method, params } = parseArgs(process.argv.slice(2));
  if (!method) {
    showHelp();
    return;
  }

  const hive = createHiveGovernance();
  try {
    const response = await new RpcDispatcher(hive).dispatch(method, params);
    console.log(JSON.stringify(response.ok ? response : { ok: false, error: response.error }, null, 2));
    if (!response.ok) {
      process.exitCode = 1;
    }
  } finally {
    hive.close();
  }
}

if (require.main === module) {
  main().catch(error => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  });
}
