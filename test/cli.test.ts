/**
 * CLI argument parsing tests
 */

import { describe, it, expect } from '@jest/globals';
import { parseArgs } from '../src/cli/index.js';

describe('parseArgs', () => {
  it('should take the method and named parameters', () => {
    expect(parseArgs(['vote', '--pollId', 'abc', '--choice', 'yes', '--reason', 'good peer'])).toEqual({
      method: 'vote',
      params: { pollId: 'abc', choice: 'yes', reason: 'good peer' },
    });
  });

  it('should parse JSON values', () => {
    expect(parseArgs(['poll-create', '--options', '["yes","no"]', '--deadline', '1767225600']).params)
      .toEqual({ options: ['yes', 'no'], deadline: 1767225600 });
  });

  it('should keep hex keys as strings', () => {
    const pubkey = '12'.repeat(32);
    expect(parseArgs(['bind-nostr', '--pubkey', pubkey]).params).toEqual({ pubkey });
  });

  it('should treat a bare flag as true', () => {
    expect(parseArgs(['provision-identity', '--reprovision']).params).toEqual({ reprovision: true });
  });

  it('should merge a --json object', () => {
    expect(parseArgs(['upgrade', '--json', '{"bondSats":60000}', '--targetTier', 'governance']).params)
      .toEqual({ bondSats: 60000, targetTier: 'governance' });
  });

  it('should reject a --json value that is not an object', () => {
    expect(() => parseArgs(['status', '--json', '[1]'])).toThrow('--json must be a JSON object');
  });

  it('should reject positional arguments', () => {
    expect(() => parseArgs(['status', 'extra'])).toThrow('Unexpected argument: extra');
  });

  it('should return no method for help or an empty command line', () => {
    expect(parseArgs([]).method).toBeNull();
    expect(parseArgs(['help']).method).toBeNull();
  });
});
