/**
 * Cryptographic helpers: hashing, canonical encodings, key validation and
 * DID derivation. Signing itself is delegated to a SignerAdapter.
 */

import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, hexToBytes, concatBytes, utf8ToBytes } from '@noble/hashes/utils';
import { secp256k1 } from '@noble/curves/secp256k1';
import { utils as baseUtils } from '@scure/base';
import type { BindingKind, Did, Hash, NodePublicKey, VoteChoice } from './types.js';

/** RFC 4648 base32, lower case, no padding (multibase prefix `b`) */
const base32Lower = baseUtils.chain(
  baseUtils.radix2(5),
  baseUtils.alphabet('abcdefghijklmnopqrstuvwxyz234567'),
  baseUtils.join('')
);

const CID_VERSION_1 = 0x01;
const CODEC_RAW = 0x55;
const MULTIHASH_SHA2_256 = 0x12;
const SHA2_256_LENGTH = 0x20;

export const DID_PREFIX = 'did:cid:';

/** Domain tags for signed payloads; bump the version when the layout changes */
const BINDING_DOMAIN = 'hive-gov/binding/v1';
const VOTE_DOMAIN = 'hive-gov/vote/v1';

export interface AttestationFields {
  did: Did;
  kind: BindingKind;
  externalKey: string;
  nodePublicKey: NodePublicKey;
  timestamp: number;
}

export interface VoteFields {
  pollId: string;
  voter: NodePublicKey;
  choice: VoteChoice;
  reason: string;
}

export class Crypto {
  /**
   * SHA-256 over the concatenation of all inputs
   */
  static hash(...inputs: (Uint8Array | string)[]): Hash {
    const parts = inputs.map(input => typeof input === 'string' ? utf8ToBytes(input) : input);
    return bytesToHex(sha256(concatBytes(...parts)));
  }

  static isHex(value: unknown, length: number): value is string {
    return typeof value === 'string'
      && value.length === length
      && /^[0-9a-f]+$/i.test(value);
  }

  /**
   * A 66-char hex compressed secp256k1 point that lies on the curve
   */
  static isValidNodePublicKey(key: unknown): key is NodePublicKey {
    if (!Crypto.isHex(key, 66)) return false;
    if (!key.startsWith('02') && !key.startsWith('03')) return false;
    try {
      secp256k1.ProjectivePoint.fromHex(key).assertValidity();
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Derive the DID for a node key. Generation 0 hashes the raw key bytes;
   * later generations append the generation as a 4-byte big-endian integer.
   */
  static deriveDid(nodePublicKey: NodePublicKey, generation = 0): Did {
    if (!Number.isInteger(generation) || generation < 0 || generation > 0xffffffff) {
      throw new RangeError(`Invalid DID generation: ${generation}`);
    }

    const keyBytes = hexToBytes(nodePublicKey.toLowerCase());
    let input = keyBytes;
    if (generation > 0) {
      const suffix = new Uint8Array(4);
      new DataView(suffix.buffer).setUint32(0, generation, false);
      input = concatBytes(keyBytes, suffix);
    }

    const cid = concatBytes(
      Uint8Array.of(CID_VERSION_1, CODEC_RAW, MULTIHASH_SHA2_256, SHA2_256_LENGTH),
      sha256(input)
    );

    return `${DID_PREFIX}b${base32Lower.encode(cid)}`;
  }

  static isValidDid(did: unknown): did is Did {
    return typeof did === 'string' && /^did:cid:b[a-z2-7]{58}$/.test(did);
  }

  /**
   * JSON with object keys sorted at every depth
   */
  static canonicalJson(value: unknown): string {
    return JSON.stringify(sortKeys(value));
  }

  static attestationPayload(fields: AttestationFields): string {
    return `${BINDING_DOMAIN}:${Crypto.canonicalJson(fields)}`;
  }

  static votePayload(fields: VoteFields): string {
    return `${VOTE_DOMAIN}:${Crypto.canonicalJson(fields)}`;
  }

  /**
   * Byte length of a string once UTF-8 encoded
   */
  static byteLength(text: string): number {
    return utf8ToBytes(text).length;
  }

  static toHex(bytes: Uint8Array): string {
    return bytesToHex(bytes);
  }

  static fromHex(hex: string): Uint8Array {
    return hexToBytes(hex);
  }
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return Object.fromEntries(entries.map(([key, item]) => [key, sortKeys(item)]));
  }
  return value;
}
