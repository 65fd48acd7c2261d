/**
 * ModDesk — src/features/applications/decisions.ts
 * WHAT: Staff decisions on join applications: accept grants a role, deny notifies by DM and bans.
 * FLOWS:
 *  - acceptApplicant(guildId, applicant, role, moderator) → assignRole → ApplicantAccepted
 *  - denyApplicant(guildId, applicant, moderator) → DM notice (closed DMs recorded) → ban → ApplicantDenied
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { COLOR_DANGER } from "../../lib/constants.js";
import { logger } from "../../lib/logger.js";
import { fail, ok, permissionDenied, runGuarded, type Outcome } from "../../lib/outcome.js";
import { hasRequiredRole, type Actor, type PrivilegedRoleConfig } from "../../lib/roles.js";
import { failureFromPlatform } from "../../platform/failures.js";
import type { Platform, RoleInfo } from "../../platform/types.js";

export interface Applicant {
  id: string;
  displayName: string;
}

export interface ApplicantAccepted {
  applicant: Applicant;
  role: RoleInfo;
  moderatorId: string;
}

export interface ApplicantDenied {
  applicant: Applicant;
  moderatorId: string;
  /** False when the applicant has DMs closed; the ban still went through */
  notified: boolean;
}

export function denialNotice(applicantId: string): string {
  return (
    `❌ <@${applicantId}>, your application has been denied.\n` +
    "After reviewing it, we decided not to accept it this time.\n" +
    "You're welcome to keep participating and to try again in the future. Thanks for your interest!"
  );
}

export function banReason(moderatorName: string): string {
  return `Application denied by ${moderatorName}`;
}

export interface ApplicationDecisionsDeps {
  platform: Platform;
  roles: PrivilegedRoleConfig;
}

export class ApplicationDecisions {
  constructor(private readonly deps: ApplicationDecisionsDeps) {}

  acceptApplicant(
    guildId: string,
    applicant: Applicant,
    role: RoleInfo,
    moderator: Actor
  ): Promise<Outcome<ApplicantAccepted>> {
    if (!hasRequiredRole(moderator, this.deps.roles)) {
      return Promise.resolve(permissionDenied("accept applications"));
    }

    return runGuarded<ApplicantAccepted>(
      "applications.accept",
      { guildId, applicantId: applicant.id, roleId: role.id, moderatorId: moderator.id },
      async () => {
        const assigned = await this.deps.platform.assignRole(
          guildId,
          applicant.id,
          role.id,
          `Application accepted by ${moderator.displayName}`
        );
        if (!assigned.ok) {
          logger.error(
            { evt: "applicant_role_failed", guildId, applicantId: applicant.id, roleId: role.id, failure: assigned.kind },
            "[applications] could not assign role"
          );
          return fail(
            failureFromPlatform(assigned, {
              action: `assign the role ${role.name}`,
              remediation: `Open Server Settings → Roles and drag my role above ${role.name}, then try again.`,
              entity: "member",
              id: applicant.id,
            })
          );
        }

        logger.info(
          { evt: "applicant_accepted", guildId, applicantId: applicant.id, roleId: role.id, moderatorId: moderator.id },
          "[applications] accepted"
        );
        return ok({ applicant, role, moderatorId: moderator.id });
      }
    );
  }

  denyApplicant(guildId: string, applicant: Applicant, moderator: Actor): Promise<Outcome<ApplicantDenied>> {
    if (!hasRequiredRole(moderator, this.deps.roles)) {
      return Promise.resolve(permissionDenied("deny applications"));
    }

    return runGuarded<ApplicantDenied>(
      "applications.deny",
      { guildId, applicantId: applicant.id, moderatorId: moderator.id },
      async () => {
        const { platform } = this.deps;

        // DM before the ban; once banned the user shares no guild with us
        const dm = await platform.sendDirectMessage(applicant.id, {
          embeds: [{ title: "❌ Application denied", description: denialNotice(applicant.id), color: COLOR_DANGER }],
        });
        if (!dm.ok) {
          logger.warn(
            { evt: "applicant_dm_failed", applicantId: applicant.id, failure: dm.kind },
            "[applications] denial DM not delivered"
          );
        }

        const banned = await platform.banUser(guildId, applicant.id, banReason(moderator.displayName));
        if (!banned.ok) {
          logger.error(
            { evt: "applicant_ban_failed", guildId, applicantId: applicant.id, failure: banned.kind },
            "[applications] could not ban"
          );
          return fail(
            failureFromPlatform(banned, {
              action: "ban members",
              remediation: "Make sure my role has the Ban Members permission.",
              entity: "member",
              id: applicant.id,
            })
          );
        }

        logger.info(
          { evt: "applicant_denied", guildId, applicantId: applicant.id, moderatorId: moderator.id, notified: dm.ok },
          "[applications] denied and banned"
        );
        return ok({ applicant, moderatorId: moderator.id, notified: dm.ok });
      }
    );
  }
}
