// SPDX-License-Identifier: LicenseRef-ANW-1.0
/**
 * ModDesk — src/lib/roles.ts
 * WHAT: Privileged role matching by role *name*.
 * WHY: Staff roles are recognized by name (with or without a decoration prefix such as "👑 "),
 *      so a server can recreate a role without reconfiguring the bot.
 *
 * Role names are read from the acting member at request time and never cached here.
 */

export interface PrivilegedRoleConfig {
  /** Plain role names, e.g. ["Manager", "Assistant Manager"] */
  names: readonly string[];
  /** Prefix some servers put in front of staff role names */
  decoration: string;
}

/** Whoever triggered the event or command, as seen at that moment. */
export interface Actor {
  id: string;
  displayName: string;
  roleNames: readonly string[];
}

export function privilegedRoleNames(config: PrivilegedRoleConfig): Set<string> {
  const names = new Set<string>();
  for (const name of config.names) {
    names.add(name);
    if (config.decoration) {
      names.add(`${config.decoration}${name}`);
    }
  }
  return names;
}

/** Exact, case-sensitive match. */
export function isPrivilegedRoleName(roleName: string, config: PrivilegedRoleConfig): boolean {
  return privilegedRoleNames(config).has(roleName);
}

export function hasRequiredRole(actor: Actor, config: PrivilegedRoleConfig): boolean {
  const allowed = privilegedRoleNames(config);
  return actor.roleNames.some((name) => allowed.has(name));
}
