import { randomUUID } from "node:crypto";

import { AlreadyRegisteredError } from "./errors.js";
import { normaliseIdentity } from "./normalise.js";
import type { Identity, RegistrySnapshot } from "./types.js";

/** Options accepted when creating the identity registry. */
export interface IdentityRegistryOptions {
  /** Identifier override, defaults to a random UUID. */
  id?: string;
}

/**
 * Set of identities that registered through the normal path. The ordered
 * array preserves insertion order for consumers while the companion set keeps
 * membership checks constant time.
 */
export class IdentityRegistry {
  public readonly id: string;
  public readonly creator: Identity;
  public readonly createdAt: number;

  private readonly ordered: Identity[] = [];
  private readonly members = new Set<Identity>();

  private constructor(creator: Identity, createdAt: number, id: string) {
    this.id = id;
    this.creator = creator;
    this.createdAt = createdAt;
  }

  /** Create an empty registry attributed to {@link creator}. */
  static create(creator: string, createdAt: number, options: IdentityRegistryOptions = {}): IdentityRegistry {
    return new IdentityRegistry(normaliseIdentity(creator, "creator"), createdAt, options.id ?? randomUUID());
  }

  /** Throws {@link AlreadyRegisteredError} without mutating when the identity is known. */
  assertAvailable(identity: Identity): void {
    if (this.members.has(identity)) {
      throw new AlreadyRegisteredError(this.id, identity);
    }
  }

  register(identity: string): Identity {
    const normalised = normaliseIdentity(identity);
    this.assertAvailable(normalised);
    this.members.add(normalised);
    this.ordered.push(normalised);
    return normalised;
  }

  has(identity: string): boolean {
    return this.members.has(identity.trim());
  }

  get size(): number {
    return this.ordered.length;
  }

  /** Registered identities in insertion order. */
  list(): Identity[] {
    return [...this.ordered];
  }

  describe(): RegistrySnapshot {
    return {
      id: this.id,
      creator: this.creator,
      createdAt: this.createdAt,
      registeredUsers: this.list(),
    };
  }
}
