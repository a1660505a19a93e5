export {
  createRepositoryError,
  createNotFoundError,
  createDecodeError,
  createCancelledError,
  createDomainRuleError,
  fromHttpError,
  extractServerMessage,
  isRetryableError,
  requiresReauthentication,
  describeError,
} from './errors.js';
export type { RepositoryError, RepositoryErrorCode, DomainRule } from './types.js';
