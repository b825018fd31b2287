/**
 * Auth module: credential validation, upgrade-request parsing and admission.
 */

export {
  createJwtCredentialValidator,
  identityFromClaims,
  type CredentialValidator,
  type Identity,
  type JwtCredentialOptions,
} from "./credential.js";
export {
  LAST_SEQ_HEADER,
  LAST_SEQ_QUERY_PARAM,
  chatIdFromPath,
  parseLastSeenSeq,
  tokenFromRequest,
  type LastSeenSeqResult,
  type UpgradeRequest,
} from "./token-auth.js";
export { AuthGate, type AuthGateOptions } from "./auth-gate.js";
