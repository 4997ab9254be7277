import { describe, it } from "mocha";
import { expect } from "chai";
import fc from "fast-check";

import { AuthorizationPolicy } from "../src/auth/policy.js";
import {
  CAPABILITY_PROFILES,
  CAPABILITY_PROFILES_ORDER,
  PROTOCOL_METHODS,
  isCapabilityProfile,
  isProtocolCall,
  isRegisteredCall,
  profileRank,
  protocolCall,
} from "../src/auth/profiles.js";
import { AuthorizationError } from "../src/rpc/errors.js";

const CATALOGUE: Array<[string, readonly string[]]> = Object.entries(PROTOCOL_METHODS);
const ALL_CALLS = CATALOGUE.flatMap(([capability, methods]) => methods.map((method) => protocolCall(capability, method)));

describe("capability profiles", () => {
  it("orders profiles from viewer to maintainer", () => {
    expect(CAPABILITY_PROFILES_ORDER.map(profileRank)).to.deep.equal([0, 1, 2, 3, 4]);
    expect(isCapabilityProfile("operator")).to.equal(true);
    expect(isCapabilityProfile("admin")).to.equal(false);
  });

  it("grants every lower profile's calls to each higher profile", () => {
    fc.assert(
      fc.property(
        fc.constantFrom(...CAPABILITY_PROFILES_ORDER),
        fc.constantFrom(...CAPABILITY_PROFILES_ORDER),
        (left, right) => {
          const [lower, higher] = profileRank(left) <= profileRank(right) ? [left, right] : [right, left];
          return [...CAPABILITY_PROFILES[lower]].every((call) => CAPABILITY_PROFILES[higher].has(call));
        },
      ),
    );
  });

  it("only grants calls from the catalogue", () => {
    for (const profile of CAPABILITY_PROFILES_ORDER) {
      for (const call of CAPABILITY_PROFILES[profile]) {
        expect(isProtocolCall(call), `${profile} grants ${call}`).to.equal(true);
      }
    }
  });

  it("keeps destructive calls out of reach of lower profiles", () => {
    expect(CAPABILITY_PROFILES.viewer.has("tasks.update_scratchpad")).to.equal(false);
    expect(CAPABILITY_PROFILES.planner.has("jobs.submit")).to.equal(false);
    expect(CAPABILITY_PROFILES.pair_worker.has("review.approve")).to.equal(false);
    expect(CAPABILITY_PROFILES.operator.has("review.merge")).to.equal(false);
    expect(CAPABILITY_PROFILES.operator.has("tasks.delete")).to.equal(false);
    expect(CAPABILITY_PROFILES.maintainer.has("review.merge")).to.equal(true);
  });

  it("registers every catalogue call with some profile", () => {
    expect(ALL_CALLS.filter((call) => !isRegisteredCall(call))).to.deep.equal([]);
    expect(isRegisteredCall("tasks.archive")).to.equal(false);
  });
});

describe("authorization policy", () => {
  it("allows the calls of the bound profile", () => {
    const policy = new AuthorizationPolicy("pair_worker");
    expect(policy.check("jobs", "submit")).to.equal(true);
    expect(policy.check("review", "request")).to.equal(true);
    expect(policy.check("review", "merge")).to.equal(false);
  });

  it("denies unknown pairs below maintainer", () => {
    expect(new AuthorizationPolicy("operator").check("tasks", "archive")).to.equal(false);
  });

  it("lets maintainer through unregistered pairs only", () => {
    const policy = new AuthorizationPolicy("maintainer");
    expect(policy.check("tasks", "archive")).to.equal(true);
    expect(policy.check("review", "merge")).to.equal(true);
  });

  it("enforce raises an authorization error naming the pair", () => {
    const policy = new AuthorizationPolicy("viewer");
    let caught: unknown;
    try {
      policy.enforce("tasks", "create");
    } catch (error) {
      caught = error;
    }
    expect(caught).to.be.instanceOf(AuthorizationError);
    expect(caught).to.have.property("code", "AUTHORIZATION_DENIED");
    expect(caught).to.have.property("message", "Profile 'viewer' is not authorized for tasks.create");
    expect(caught).to.have.deep.property("meta", { profile: "viewer", capability: "tasks", method: "create" });
  });

  it("never throws for allowed calls", () => {
    const policy = new AuthorizationPolicy("viewer");
    expect(() => policy.enforce("tasks", "list")).not.to.throw();
    expect(policy.allowedCalls.size).to.equal(CAPABILITY_PROFILES.viewer.size);
  });
});
