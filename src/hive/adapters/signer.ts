/**
 * Signer Adapter
 * The node's signing oracle. Keys never leave it; callers only see the
 * public key and compact signatures over sha256(message).
 */

import { secp256k1 } from '@noble/curves/secp256k1';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, hexToBytes, utf8ToBytes } from '@noble/hashes/utils';
import { HiveError, ErrorCodes, isHiveError, errorMessage } from '../types.js';
import type { NodePublicKey, Signature } from '../types.js';

export interface SignerAdapter {
  /**
   * Compressed public key of the local node
   */
  getNodePublicKey(): Promise<NodePublicKey>;

  /**
   * Sign a UTF-8 message. Throws SignerUnavailable when the oracle is down.
   */
  signMessage(message: string): Promise<Signature>;

  /**
   * Check a signature made by `publicKey` over `message`
   */
  verifyMessage(message: string, signature: Signature, publicKey: NodePublicKey): Promise<boolean>;
}

/**
 * Run a signer call, reporting any failure that is not already a HiveError
 * as SignerUnavailable
 */
export async function callSigner<T>(fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (isHiveError(error)) throw error;
    throw new HiveError(`Signer unavailable: ${errorMessage(error)}`, ErrorCodes.SIGNER_UNAVAILABLE, 503);
  }
}

/**
 * In-process secp256k1 signer for development and tests
 */
export class Secp256k1Signer implements SignerAdapter {
  private readonly privateKey: Uint8Array;
  private readonly publicKey: NodePublicKey;

  constructor(privateKey?: Uint8Array | string) {
    this.privateKey = typeof privateKey === 'string'
      ? hexToBytes(privateKey)
      : privateKey ?? secp256k1.utils.randomPrivateKey();
    this.publicKey = bytesToHex(secp256k1.getPublicKey(this.privateKey, true));
  }

  async getNodePublicKey(): Promise<NodePublicKey> {
    return this.publicKey;
  }

  async signMessage(message: string): Promise<Signature> {
    return secp256k1.sign(sha256(utf8ToBytes(message)), this.privateKey).toCompactHex();
  }

  async verifyMessage(message: string, signature: Signature, publicKey: NodePublicKey): Promise<boolean> {
    try {
      return secp256k1.verify(hexToBytes(signature), sha256(utf8ToBytes(message)), hexToBytes(publicKey));
    } catch {
      // Malformed signature or key
      return false;
    }
  }
}

/**
 * Signer whose availability and output can be controlled by tests
 */
export class MockSigner extends Secp256k1Signer {
  private available = true;
  private corrupt = false;
  private verifyFailure: Error | null = null;

  setAvailable(available: boolean): void {
    this.available = available;
  }

  /**
   * When set, signatures come back with their last byte flipped
   */
  setCorrupt(corrupt: boolean): void {
    this.corrupt = corrupt;
  }

  /**
   * Make every verification reject with `error` (null to clear)
   */
  setVerifyFailure(error: Error | null): void {
    this.verifyFailure = error;
  }

  async verifyMessage(message: string, signature: Signature, publicKey: NodePublicKey): Promise<boolean> {
    if (this.verifyFailure) throw this.verifyFailure;
    return super.verifyMessage(message, signature, publicKey);
  }

  async signMessage(message: string): Promise<Signature> {
    if (!this.available) {
      throw new HiveError('Signer is unavailable', ErrorCodes.SIGNER_UNAVAILABLE, 503);
    }
    const signature = await super.signMessage(message);
    if (!this.corrupt) return signature;

    const last = parseInt(signature.slice(-2), 16) ^ 0xff;
    return signature.slice(0, -2) + last.toString(16).padStart(2, '0');
  }
}
