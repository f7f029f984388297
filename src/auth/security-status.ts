/**
 * Security framework result codes and their user-facing messages.
 * The wording is part of the CLI's output contract; keep it verbatim.
 */

export const SEC_ITEM_NOT_FOUND = -25295;

export const SECURITY_STATUS_MESSAGES: ReadonlyMap<number, string> = new Map([
  [0, "Success"],
  [-4, "Function or operation not implemented"],
  [-25291, "No keychain is available"],
  [-25292, "The specified keychain is not a valid keychain file"],
  [-25293, "The specified keychain could not be opened"],
  [-25294, "A duplicate keychain item already exists"],
  [-25295, "The specified item could not be found in the keychain"],
  [-25296, "Keychain interaction is not allowed by the caller"],
  [-25297, "The keychain interaction was blocked by the user"],
  [-25298, "The caller does not have access to the keychain item"],
  [-25299, "The specified data is invalid for keychain"],
  [-25300, "No default keychain exists"],
  [-25308, "Interaction with the Security Server is not allowed"],
  [-26275, "An authorization/authentication was canceled"],
  [-26276, "Authorization/Authentication failed"],
  [-34018, "A required entitlement is missing (code signing issue)"],
  [-50, "One or more parameters passed were not valid"],
  [-67030, "Device passcode is not set (required for biometric protection)"],
]);

export function describeSecurityStatus(status: number): string {
  const message = SECURITY_STATUS_MESSAGES.get(status);
  if (message !== undefined) {
    return `${message} (error ${status})`;
  }
  return `Unknown security error (error ${status})`;
}
