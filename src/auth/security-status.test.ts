import { describe, it, expect } from "vitest";
import { SECURITY_STATUS_MESSAGES, SEC_ITEM_NOT_FOUND, describeSecurityStatus } from "./security-status.js";

describe("describeSecurityStatus", () => {
  it("appends the status to a known message", () => {
    expect(describeSecurityStatus(SEC_ITEM_NOT_FOUND)).toBe(
      "The specified item could not be found in the keychain (error -25295)",
    );
    expect(describeSecurityStatus(-34018)).toBe(
      "A required entitlement is missing (code signing issue) (error -34018)",
    );
  });

  it("describes an unknown status generically", () => {
    expect(describeSecurityStatus(-99999)).toBe("Unknown security error (error -99999)");
  });

  it("covers the documented status codes", () => {
    expect(SECURITY_STATUS_MESSAGES.size).toBe(18);
    expect(SECURITY_STATUS_MESSAGES.get(-67030)).toBe(
      "Device passcode is not set (required for biometric protection)",
    );
  });
});
