/**
 * @session-service/auth
 *
 * Credential verification and secure token handling for the session service
 */

export type { Credentials, AuthenticatedIdentity, CredentialProvider } from './credentials/types.js';
export { StaticCredentialProvider, parseUserList } from './credentials/static-credential-provider.js';
export { generateToken, constantTimeEquals, DEFAULT_TOKEN_BYTES } from './tokens.js';
