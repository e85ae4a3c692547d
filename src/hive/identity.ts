/**
 * Node identity and DID management
 *
 * A node's DID is derived from its public key and a generation counter, so
 * anyone holding the key can recompute it. Reprovisioning bumps the
 * generation; older DIDs stay resolvable through the history table.
 */

import { v4 as uuidv4 } from 'uuid';
import { Crypto } from './crypto.js';
import type { SQLiteHiveStore } from './storage.js';
import { callSigner } from './adapters/signer.js';
import type { SignerAdapter } from './adapters/signer.js';
import type { Outbox } from './outbox.js';
import type {
  Binding,
  BindingKind,
  Clock,
  DidHistoryEntry,
  GovernanceTier,
  Identity,
  NodePublicKey,
} from './types.js';
import { BINDING_KINDS, HiveError, ErrorCodes } from './types.js';

export interface IdentityStatus {
  identity: Identity;
  bindings: Binding[];
  tier: GovernanceTier;
}

const EXTERNAL_KEY_RULES: Record<BindingKind, RegExp> = {
  nostr: /^[0-9a-f]{64}$/,
  cln: /^0[23][0-9a-f]{64}$/,
};

export function isBindingKind(kind: unknown): kind is BindingKind {
  return typeof kind === 'string' && BINDING_KINDS.some(k => k === kind);
}

/**
 * Validate and lower-case a node public key
 */
export function normalizeNodeKey(nodePublicKey: unknown): NodePublicKey {
  if (!Crypto.isValidNodePublicKey(nodePublicKey)) {
    throw new HiveError(
      'Node public key must be a 66-char hex compressed secp256k1 point',
      ErrorCodes.INVALID_KEY_FORMAT
    );
  }
  return nodePublicKey.toLowerCase();
}

export class IdentityManager {
  constructor(
    private store: SQLiteHiveStore,
    private signer: SignerAdapter,
    private outbox: Outbox,
    private clock: Clock
  ) {}

  /**
   * Create the node's identity, or return the existing one. With
   * `reprovision`, derive the next-generation DID and supersede the old one.
   */
  provision(nodePublicKey: NodePublicKey, options?: { reprovision?: boolean }): Identity {
    const key = normalizeNodeKey(nodePublicKey);

    return this.store.transaction(() => {
      const existing = this.store.getIdentity(key);
      const now = this.clock();

      if (existing && !options?.reprovision) {
        return existing;
      }

      let identity: Identity;
      if (!existing) {
        identity = {
          nodePublicKey: key,
          did: Crypto.deriveDid(key, 0),
          generation: 0,
          tier: 'basic',
          bondSats: 0,
          bondVerifiedAt: null,
          createdAt: now,
          updatedAt: now,
        };
        this.store.insertIdentity(identity);
      } else {
        const generation = existing.generation + 1;
        identity = {
          ...existing,
          did: Crypto.deriveDid(key, generation),
          generation,
          updatedAt: now,
        };
        this.store.supersedeDid(existing.did, now);
        const superseded = this.store.supersedeBindingsForDid(existing.did, now);
        this.store.updateIdentityDid(key, identity.did, generation, now);
        console.log(`[Identity] Reprovisioned generation ${generation}; ${superseded} binding(s) superseded`);
      }

      this.store.insertDidHistory({
        did: identity.did,
        nodePublicKey: key,
        generation: identity.generation,
        createdAt: now,
        supersededAt: null,
      });

      this.outbox.enqueue('identity-generate', {
        did: identity.did,
        nodePublicKey: key,
        generation: identity.generation,
        createdAt: now,
      });

      console.log(`[Identity] Provisioned ${identity.did}`);
      return identity;
    });
  }

  /**
   * Attest, with the node's signature, that `did` controls `externalKey`
   */
  async bind(did: string, kind: string, externalKey: string): Promise<Binding> {
    if (!isBindingKind(kind)) {
      throw new HiveError(`Unknown binding kind: ${kind}`, ErrorCodes.UNKNOWN_BINDING_KIND);
    }

    const normalizedKey = typeof externalKey === 'string' ? externalKey.trim().toLowerCase() : '';
    if (!EXTERNAL_KEY_RULES[kind].test(normalizedKey)) {
      throw new HiveError(
        kind === 'nostr'
          ? 'Nostr key must be 64 hex chars'
          : 'CLN key must be 66 hex chars starting with 02 or 03',
        ErrorCodes.INVALID_EXTERNAL_KEY_FORMAT
      );
    }

    const entry = this.lookupCurrentDid(did);

    const signerKey = await callSigner(() => this.signer.getNodePublicKey());
    if (signerKey.toLowerCase() !== entry.nodePublicKey) {
      throw new HiveError('DID belongs to a different node', ErrorCodes.FOREIGN_IDENTITY, 403);
    }

    const timestamp = this.clock();
    const payload = Crypto.attestationPayload({
      did: entry.did,
      kind,
      externalKey: normalizedKey,
      nodePublicKey: entry.nodePublicKey,
      timestamp,
    });

    const signature = await callSigner(() => this.signer.signMessage(payload));
    const valid = await callSigner(() => this.signer.verifyMessage(payload, signature, entry.nodePublicKey));
    if (!valid) {
      throw new HiveError('Signer returned an invalid attestation signature', ErrorCodes.INVALID_SIGNATURE);
    }

    const binding: Binding = {
      bindingId: uuidv4(),
      did: entry.did,
      nodePublicKey: entry.nodePublicKey,
      kind,
      externalKey: normalizedKey,
      payload,
      signature,
      createdAt: timestamp,
      supersededAt: null,
    };

    return this.store.transaction(() => {
      // The DID may have been reprovisioned while the signer was working
      this.lookupCurrentDid(entry.did);
      this.store.supersedeBindingsOfKind(entry.nodePublicKey, kind, timestamp);
      this.store.insertBinding(binding);
      console.log(`[Identity] Bound ${kind} key to ${binding.did}`);
      return binding;
    });
  }

  /**
   * Identity, current bindings and tier for a current or historic DID
   */
  status(did: string): IdentityStatus {
    const identity = this.resolve(did);
    if (!identity) {
      throw new HiveError(`No identity for DID: ${did}`, ErrorCodes.IDENTITY_NOT_FOUND, 404);
    }
    return {
      identity,
      bindings: this.store.listBindings(identity.did),
      tier: identity.tier,
    };
  }

  /**
   * Look up the identity owning `did`, which may be a superseded DID
   */
  resolve(did: string): Identity | null {
    if (!Crypto.isValidDid(did)) {
      throw new HiveError(`Malformed DID: ${did}`, ErrorCodes.INVALID_DID);
    }
    const entry = this.store.getDidHistory(did);
    return entry ? this.store.getIdentity(entry.nodePublicKey) : null;
  }

  get(nodePublicKey: NodePublicKey): Identity | null {
    return this.store.getIdentity(nodePublicKey.toLowerCase());
  }

  history(nodePublicKey: NodePublicKey): DidHistoryEntry[] {
    return this.store.listDidHistory(normalizeNodeKey(nodePublicKey));
  }

  private lookupCurrentDid(did: string): DidHistoryEntry {
    if (!Crypto.isValidDid(did)) {
      throw new HiveError(`Malformed DID: ${did}`, ErrorCodes.INVALID_DID);
    }
    const entry = this.store.getDidHistory(did);
    if (!entry) {
      throw new HiveError(`No identity for DID: ${did}`, ErrorCodes.IDENTITY_NOT_FOUND, 404);
    }
    if (entry.supersededAt !== null) {
      throw new HiveError('DID has been superseded by reprovisioning', ErrorCodes.STALE_DID, 409);
    }
    return entry;
  }
}
