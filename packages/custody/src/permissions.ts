/**
 * @tallyvault/custody — Permission Gate.
 *
 * Holds the two capability roles and answers "may this principal act?".
 *
 * Rules:
 * - Only admin may grant or revoke roles
 * - Admin is not implicitly operator
 * - Granting an existing member or revoking a non-member is a no-op
 */

import type { Principal } from "@tallyvault/types";
import type { Role } from "./types.js";
import { CustodyError, ROLES } from "./types.js";

export class PermissionGate {
  private readonly _members: Map<Role, Set<Principal>> = new Map(
    ROLES.map((role) => [role, new Set<Principal>()]),
  );

  /**
   * Bootstrap: assign both roles to the deploying principal.
   */
  static bootstrap(deployer: Principal): PermissionGate {
    const gate = new PermissionGate();
    gate._set("admin").add(deployer);
    gate._set("operator").add(deployer);
    return gate;
  }

  /**
   * Restore membership sets verbatim (used by snapshot restore).
   */
  static fromMembers(members: Readonly<Record<Role, readonly Principal[]>>): PermissionGate {
    const gate = new PermissionGate();
    for (const role of ROLES) {
      for (const principal of members[role]) {
        gate._set(role).add(principal);
      }
    }
    return gate;
  }

  hasRole(role: Role, principal: Principal): boolean {
    return this._set(role).has(principal);
  }

  /**
   * Fail UNAUTHORIZED unless `principal` holds `role`.
   */
  require(role: Role, principal: Principal): void {
    if (!this.hasRole(role, principal)) {
      throw new CustodyError(
        "UNAUTHORIZED",
        `Principal "${principal}" lacks the ${role} role`,
      );
    }
  }

  /**
   * Grant `role` to `principal`. Requires admin.
   * Returns true if membership changed.
   */
  grant(actor: Principal, role: Role, principal: Principal): boolean {
    this.require("admin", actor);
    const members = this._set(role);
    if (members.has(principal)) {
      return false;
    }
    members.add(principal);
    return true;
  }

  /**
   * Revoke `role` from `principal`. Requires admin.
   * Returns true if membership changed.
   */
  revoke(actor: Principal, role: Role, principal: Principal): boolean {
    this.require("admin", actor);
    return this._set(role).delete(principal);
  }

  members(role: Role): readonly Principal[] {
    return [...this._set(role)];
  }

  private _set(role: Role): Set<Principal> {
    const members = this._members.get(role);
    if (members === undefined) {
      throw new CustodyError("UNAUTHORIZED", `Unknown role: "${String(role)}"`);
    }
    return members;
  }
}
