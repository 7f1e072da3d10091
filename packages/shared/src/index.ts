export { createLogger, redactMeta, type SafeLogger } from './logger';
export { AppError, ErrorCode, type AppErrorOptions, type KindedError, type ValidationIssue } from './errors';
export {
  loadConfig,
  BaseConfigSchema,
  DatabaseConfigSchema,
  JwtConfigSchema,
  ApiConfigSchema,
  AdminCliConfigSchema,
  PasswordHashConfigSchema,
  type BaseConfig,
  type PasswordHashConfig,
  type JwtConfig,
  type ApiConfig,
  type AdminCliConfig,
} from './config';
export { JoseTokenService, type TokenServiceConfig, type JwtAlgorithm } from './auth/token-service';
export {
  Argon2PasswordHasher,
  DEFAULT_ARGON2_PARAMS,
  parseArgon2Params,
  type Argon2Params,
} from './auth/password-hasher';
export { InMemoryRevocationStore } from './revocation-store';
export { cryptoRandom, createSeededRandom } from './random';
