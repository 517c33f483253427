import { randomUUID } from "node:crypto";

import { CapabilityAlreadyMintedError, CapabilityMismatchError } from "./errors.js";
import { normaliseIdentity } from "./normalise.js";
import type { Identity } from "./types.js";

/**
 * Privileged token letting its holder spawn synthetic users and updates.
 * Instances are frozen and there is no transfer operation: the owner is fixed
 * when the deployment mints it.
 */
export interface DevCapability {
  readonly id: string;
  readonly owner: Identity;
  readonly mintedAt: number;
}

/**
 * Mints the deployment's single capability and remembers which tokens it
 * issued, so a structurally identical object forged elsewhere is refused.
 */
export class DevCapabilityIssuer {
  private readonly issued = new WeakSet<DevCapability>();
  private minted: DevCapability | null = null;

  mint(deployer: string, mintedAt: number): DevCapability {
    if (this.minted) {
      throw new CapabilityAlreadyMintedError(this.minted.id, this.minted.owner);
    }
    const capability: DevCapability = Object.freeze({
      id: randomUUID(),
      owner: normaliseIdentity(deployer, "deployer"),
      mintedAt,
    });
    this.issued.add(capability);
    this.minted = capability;
    return capability;
  }

  /** Throws {@link CapabilityMismatchError} unless {@link caller} holds a token this issuer minted. */
  assertHeldBy(capability: DevCapability, caller: Identity): void {
    if (!this.issued.has(capability) || capability.owner !== caller) {
      throw new CapabilityMismatchError(capability.id, caller);
    }
  }
}
