export {
  EnvVarPatternResolver,
  EnvironmentResolutionError,
  resolveConfigFields,
  type EnvVarPatternResolverConfig,
} from './environment-resolver.js';
