/**
 * Configuration for environment variable resolution
 * @public
 */
export interface EnvVarPatternResolverConfig {
  /** Maximum depth for nested variable resolution */
  maxDepth?: number;
  /** Whether to throw on missing variables without defaults */
  strict?: boolean;
  /** Custom environment source (defaults to process.env) */
  envSource?: Record<string, string | undefined>;
}

/**
 * Error thrown when an environment pattern in a configuration value cannot be
 * resolved.
 * @public
 */
export class EnvironmentResolutionError extends Error {
  public constructor(
    message: string,
    public readonly variable?: string,
  ) {
    super(message);
    this.name = 'EnvironmentResolutionError';
    Object.setPrototypeOf(this, EnvironmentResolutionError.prototype);
  }

  public static missingVariable(variable: string): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Required environment variable '${variable}' is not defined`,
      variable,
    );
  }

  public static circularReference(
    variable: string,
  ): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Circular reference detected in environment variable '${variable}'`,
      variable,
    );
  }

  public static maxDepthExceeded(depth: number): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Maximum resolution depth of ${depth} exceeded`,
    );
  }
}

const PATTERN_SOURCE = '\\$\\{([A-Z_][A-Z0-9_]*)(?::([^}]*))?\\}';

/**
 * Resolves `${VAR}` and `${VAR:default}` patterns in configuration strings.
 *
 * Values pulled from the environment are themselves resolved, so
 * `KEYCLOAK_URL=${KEYCLOAK_HOST}/auth` works. Circular references and nesting
 * deeper than `maxDepth` are rejected.
 *
 * @example
 * ```typescript
 * const resolver = new EnvVarPatternResolver({ envSource: { REALM: 'demo' } });
 * resolver.resolve('${REALM}');              // 'demo'
 * resolver.resolve('${CLIENT_ID:frontend}'); // 'frontend'
 * ```
 * @public
 */
export class EnvVarPatternResolver {
  private readonly maxDepth: number;
  private readonly strict: boolean;
  private readonly envSource: Record<string, string | undefined>;

  public constructor(config: EnvVarPatternResolverConfig = {}) {
    this.maxDepth = config.maxDepth ?? 10;
    this.strict = config.strict ?? true;
    this.envSource = config.envSource ?? process.env;
  }

  /**
   * Resolves every pattern in `value`.
   * @throws {EnvironmentResolutionError} On a missing variable in strict mode,
   * a circular reference, or nesting beyond `maxDepth`
   */
  public resolve(value: string): string {
    return this.resolveWithin(value, new Set(), 0);
  }

  private resolveWithin(
    value: string,
    visited: ReadonlySet<string>,
    depth: number,
  ): string {
    if (depth > this.maxDepth) {
      throw EnvironmentResolutionError.maxDepthExceeded(this.maxDepth);
    }

    return value.replace(
      new RegExp(PATTERN_SOURCE, 'g'),
      (match, name: string, fallback: string | undefined) => {
        if (visited.has(name)) {
          throw EnvironmentResolutionError.circularReference(name);
        }

        const next = new Set(visited).add(name);
        const envValue = this.envSource[name];

        if (envValue !== undefined) {
          return this.resolveWithin(envValue, next, depth + 1);
        }
        if (fallback !== undefined) {
          return this.resolveWithin(fallback, next, depth + 1);
        }
        if (this.strict) {
          throw EnvironmentResolutionError.missingVariable(name);
        }
        return match;
      },
    );
  }

  /**
   * Checks if a string contains an environment variable pattern.
   * @public
   */
  public static containsPattern(value: string): boolean {
    return new RegExp(PATTERN_SOURCE).test(value);
  }
}

/**
 * Resolves environment patterns in the listed string fields of a config
 * object, returning a copy. Non-string and unlisted fields are left as they
 * are.
 * @param config - Configuration object with potential environment references
 * @param fields - Fields to resolve
 * @param resolverConfig - Optional resolver settings, e.g. a custom envSource
 * @public
 */
export function resolveConfigFields<T extends object>(
  config: T,
  fields: readonly (keyof T)[],
  resolverConfig?: EnvVarPatternResolverConfig,
): T {
  const resolver = new EnvVarPatternResolver(resolverConfig);
  const resolved: T = { ...config };

  for (const field of fields) {
    const value = config[field];
    if (typeof value === 'string' && EnvVarPatternResolver.containsPattern(value)) {
      Object.assign(resolved, { [field]: resolver.resolve(value) });
    }
  }

  return resolved;
}
