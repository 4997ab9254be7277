import { AuthorizationError } from "../rpc/errors.js";
import {
  CAPABILITY_PROFILES,
  type CapabilityProfile,
  type ProtocolCall,
  isProtocolCall,
  isRegisteredCall,
  protocolCall,
} from "./profiles.js";

/**
 * Checks whether one profile may invoke a `capability.method` pair.
 *
 * Lower profiles are default-deny. `maintainer` additionally allows every pair
 * that no profile registers, so a newly added operation is maintainer-only
 * until a lower profile lists it explicitly.
 */
export class AuthorizationPolicy {
  readonly profile: CapabilityProfile;
  private readonly allowed: ReadonlySet<ProtocolCall>;

  constructor(profile: CapabilityProfile) {
    this.profile = profile;
    this.allowed = CAPABILITY_PROFILES[profile];
  }

  get allowedCalls(): ReadonlySet<ProtocolCall> {
    return this.allowed;
  }

  check(capability: string, method: string): boolean {
    const call = protocolCall(capability, method);
    if (isProtocolCall(call) && this.allowed.has(call)) {
      return true;
    }
    return this.profile === "maintainer" && !isRegisteredCall(call);
  }

  enforce(capability: string, method: string): void {
    if (!this.check(capability, method)) {
      throw new AuthorizationError(this.profile, capability, method);
    }
  }
}
