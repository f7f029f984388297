/**
 * Email alias as returned by the account service.
 */

export interface IEmailAlias {
  readonly anonymousId: string;
  readonly email: string;
  readonly label: string;
  readonly note: string;
  /** Absent when the service reports no creation time. */
  readonly createdAt?: Date | undefined;
  readonly isActive: boolean;
  readonly forwardTo: string;
  readonly domain: string;
}
