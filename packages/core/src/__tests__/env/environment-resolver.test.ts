import { describe, it, expect } from 'vitest';
import {
  EnvVarPatternResolver,
  EnvironmentResolutionError,
  resolveConfigFields,
} from '../../env/environment-resolver.js';

describe('EnvVarPatternResolver', () => {
  it('substitutes variables from the env source', () => {
    const resolver = new EnvVarPatternResolver({
      envSource: { KEYCLOAK_URL: 'https://idp.example.com', REALM: 'demo' },
    });

    expect(resolver.resolve('${KEYCLOAK_URL}/realms/${REALM}')).toBe(
      'https://idp.example.com/realms/demo',
    );
  });

  it('falls back to the default value', () => {
    const resolver = new EnvVarPatternResolver({ envSource: {} });

    expect(resolver.resolve('${CLIENT_ID:frontend}')).toBe('frontend');
  });

  it('resolves nested references', () => {
    const resolver = new EnvVarPatternResolver({
      envSource: { BASE: '${HOST}/auth', HOST: 'https://idp.example.com' },
    });

    expect(resolver.resolve('${BASE}')).toBe('https://idp.example.com/auth');
  });

  it('throws on a missing variable in strict mode', () => {
    const resolver = new EnvVarPatternResolver({ envSource: {} });

    expect(() => resolver.resolve('${MISSING}')).toThrow(
      "Required environment variable 'MISSING' is not defined",
    );
  });

  it('keeps the pattern when not strict', () => {
    const resolver = new EnvVarPatternResolver({ envSource: {}, strict: false });

    expect(resolver.resolve('${MISSING}')).toBe('${MISSING}');
  });

  it('detects circular references', () => {
    const resolver = new EnvVarPatternResolver({
      envSource: { A: '${B}', B: '${A}' },
    });

    expect(() => resolver.resolve('${A}')).toThrow(EnvironmentResolutionError);
    expect(() => resolver.resolve('${A}')).toThrow(
      "Circular reference detected in environment variable 'A'",
    );
  });

  it('enforces the maximum depth', () => {
    const resolver = new EnvVarPatternResolver({
      maxDepth: 1,
      envSource: { A: '${B}', B: '${C}', C: 'end' },
    });

    expect(() => resolver.resolve('${A}')).toThrow(
      'Maximum resolution depth of 1 exceeded',
    );
  });

  it('reports whether a value contains a pattern', () => {
    expect(EnvVarPatternResolver.containsPattern('${REALM}')).toBe(true);
    expect(EnvVarPatternResolver.containsPattern('demo')).toBe(false);
  });
});

describe('resolveConfigFields', () => {
  it('resolves only the listed string fields and returns a copy', () => {
    const config = {
      realm: '${REALM}',
      clientId: '${CLIENT_ID}',
      scopes: ['name', 'email'],
    };

    const resolved = resolveConfigFields(config, ['realm', 'scopes'], {
      envSource: { REALM: 'demo', CLIENT_ID: 'web' },
    });

    expect(resolved).toEqual({
      realm: 'demo',
      clientId: '${CLIENT_ID}',
      scopes: ['name', 'email'],
    });
    expect(config.realm).toBe('${REALM}');
  });
});
