/**
 * Access control: ALLOWED_USERS (empty means everyone) and the single admin.
 */

import { CONFIG } from "../config.js";
import { AccessDeniedError } from "../errors.js";
import { audit } from "../utils/audit-logger.js";

export const ADMIN_ONLY_MESSAGE = "Only the admin can do this.";

export class AccessPolicy {
  private readonly allowed: ReadonlySet<number>;

  constructor(
    allowedUsers: number[] = CONFIG.allowedUsers,
    private readonly adminUserId: number | undefined = CONFIG.adminUserId
  ) {
    this.allowed = new Set(allowedUsers);
  }

  isAllowed(userId: number): boolean {
    return this.allowed.size === 0 || this.allowed.has(userId) || this.isAdmin(userId);
  }

  isAdmin(userId: number): boolean {
    return this.adminUserId !== undefined && userId === this.adminUserId;
  }

  /**
   * Throws AccessDeniedError (and records the denial) when the user may not
   * proceed.
   */
  assert(userId: number, adminOnly: boolean = false, what?: string): void {
    if (!this.isAllowed(userId)) {
      audit.accessDenied(userId, { reason: "not_allowed", what });
      throw new AccessDeniedError();
    }
    if (adminOnly && !this.isAdmin(userId)) {
      audit.accessDenied(userId, { reason: "not_admin", what });
      throw new AccessDeniedError(ADMIN_ONLY_MESSAGE);
    }
  }
}
