export { createRequestId } from './utils/request/create-request-id.js';

// Structured logging with redaction
export * from './logging/index.js';

export {
  EnvVarPatternResolver,
  EnvironmentResolutionError,
  resolveConfigFields,
  type EnvVarPatternResolverConfig,
} from './env/index.js';
