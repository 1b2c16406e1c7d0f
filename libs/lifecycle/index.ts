export * from './lifecycleManager.js';
export { CredentialIssuer, generateSecret } from '../credentials/credentialIssuer.js';
export type { CredentialIssuance, CredentialIssuerOptions, EnsuredConsumer } from '../credentials/credentialIssuer.js';
export { TokenMinter } from '../tokens/tokenMinter.js';
export type { SignedToken, TokenClaims, TokenMinterOptions } from '../tokens/tokenMinter.js';
export { IdentityMapper } from '../identity/identityMapper.js';
export { HttpRegistryClient } from '../registry/registryClient.js';
export type * from '../registry/types.js';
