/**
 * Identity collaborator contract
 */

export interface Credentials {
  login: string;
  password: string;
}

export interface AuthenticatedIdentity {
  /** Stable reference to the user in the external identity system */
  credentialId: string;
}

/**
 * Verifies login credentials on behalf of the session service
 */
export interface CredentialProvider {
  /**
   * @returns The authenticated identity, or null when the credentials are rejected
   */
  authenticate(credentials: Credentials): Promise<AuthenticatedIdentity | null>;
}
