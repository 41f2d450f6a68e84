/**
 * Identity of an authenticated caller, copied from the claim the
 * authentication layer chose as the user id.
 */
export interface UserIdentity {
  claimType: string;
  claimValue: string;
  claimIssuer: string;
}

export interface SessionMetadata {
  sessionId: string;
  /** Absent for anonymous sessions */
  userIdentity?: UserIdentity;
  /** Epoch milliseconds */
  createdAt: number;
  /** Epoch milliseconds, never earlier than createdAt */
  lastActivityAt: number;
  /** Opaque payload owned by layers above the transport */
  customData?: string;
}
