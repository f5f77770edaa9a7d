import { describe, expect, it } from "vitest";
import { ADMIN_ONLY_MESSAGE, AccessPolicy } from "../src/bot/access.js";
import { AccessDeniedError } from "../src/errors.js";

describe("AccessPolicy", () => {
  it("lets everyone in when the allow list is empty", () => {
    const policy = new AccessPolicy([], 1);
    expect(policy.isAllowed(42)).toBe(true);
    expect(() => policy.assert(42)).not.toThrow();
  });

  it("limits users to the allow list and always admits the admin", () => {
    const policy = new AccessPolicy([10, 11], 1);
    expect(policy.isAllowed(10)).toBe(true);
    expect(policy.isAllowed(1)).toBe(true);
    expect(policy.isAllowed(12)).toBe(false);
    expect(() => policy.assert(12)).toThrow("Access denied.");
  });

  it("reserves admin actions for the admin", () => {
    const policy = new AccessPolicy([], 1);
    expect(() => policy.assert(1, true, "add_store")).not.toThrow();
    expect(() => policy.assert(2, true, "add_store")).toThrow(AccessDeniedError);
    expect(() => policy.assert(2, true, "add_store")).toThrow(ADMIN_ONLY_MESSAGE);
  });

  it("has no admin when none is configured", () => {
    const policy = new AccessPolicy([], undefined);
    expect(policy.isAdmin(1)).toBe(false);
    expect(() => policy.assert(1, true)).toThrow(ADMIN_ONLY_MESSAGE);
  });
});
