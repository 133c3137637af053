import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../../../src/core/errors.js';
import { loadValuesFile, parseValuesDocument } from '../../../src/core/settings/index.js';

const fixture = (name: string): string => fileURLToPath(new URL(`../../fixtures/${name}`, import.meta.url));

describe('Values files', () => {
  it('should load a values file into a scope named after its path', () => {
    const path = fixture('values-external.yaml');
    const scope = loadValuesFile(path);

    expect(scope.name).toBe(path);
    expect(scope.values).toEqual({
      application: { replicaCount: 2, env: { LOG_LEVEL: 'debug', FEATURE_FLAGS: 'cats,dogs' } },
      database: { mode: 'external', host: 'ext.example.com', port: 6432 },
      ingress: {
        enabled: true,
        hosts: [{ host: 'cats.example.com', paths: [{ path: '/', pathType: 'Prefix' }] }],
      },
    });
  });

  it('should treat an empty document as an empty scope', () => {
    expect(parseValuesDocument('', 'empty.yaml').values).toEqual({});
  });

  it('should keep dates as strings under the core schema', () => {
    const scope = parseValuesDocument('application:\n  env:\n    RELEASED: 2024-01-01\n', 'dates.yaml');
    expect(scope.values).toEqual({ application: { env: { RELEASED: '2024-01-01' } } });
  });

  it('should reject a document that is not a mapping', () => {
    expect(() => parseValuesDocument('- a\n- b\n', 'list.yaml')).toThrow(
      'list.yaml: expected a mapping at the top level'
    );
  });

  it('should report invalid YAML as a resolve-phase ConfigurationError', () => {
    try {
      parseValuesDocument('application: [unclosed', 'broken.yaml');
      expect.unreachable('parsing should fail');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.phase).toBe('resolve');
        expect(error.message).toContain('Failed to parse values file broken.yaml');
      }
    }
  });

  it('should report a missing file', () => {
    expect(() => loadValuesFile(fixture('missing.yaml'))).toThrow(ConfigurationError);
  });
});
