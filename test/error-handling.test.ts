import { type } from 'arktype';
import { describe, expect, it } from 'vitest';
import {
  ChartwrightError,
  ConfigurationError,
  ConflictError,
  DriverError,
  formatSettingsValidationError,
  MigrationFailedError,
  NamingCollisionError,
  toError,
  withPhase,
} from '../src/core/errors.js';

describe('Error Handling', () => {
  describe('Operator Messages', () => {
    it('should prefix the phase and append the setting path', () => {
      const error = new ConflictError('Cannot replace mapping with a scalar', 'application.env', '--set');

      expect(error.describe()).toBe('[resolve] Cannot replace mapping with a scalar (setting: application.env)');
      expect(error.context).toEqual({ scope: '--set' });
      expect(error.code).toBe('SETTINGS_CONFLICT');
    });

    it('should omit the setting path when there is none', () => {
      const error = new DriverError('connection refused', 'apply', undefined);
      expect(error.describe()).toBe('[driver] connection refused');
    });

    it('should point a migration timeout at its setting', () => {
      const timeout = new MigrationFailedError('too slow', 'Timeout', 'cat-api-release-migration', 2);
      const failed = new MigrationFailedError('exit 1', 'TaskFailed', 'cat-api-release-migration', 2);

      expect(timeout.settingPath).toBe('migration.timeoutSeconds');
      expect(failed.settingPath).toBeUndefined();
      expect(failed.name).toBe('MigrationFailed');
    });

    it('should list the colliding components', () => {
      const error = new NamingCollisionError('cat-api-release-app', ['application', 'service-identity']);

      expect(error.message).toBe(
        "Resource name 'cat-api-release-app' is produced by more than one component: application, service-identity"
      );
      expect(error.phase).toBe('render');
    });
  });

  describe('withPhase', () => {
    it('should keep errors that already carry a phase', () => {
      const original = new ConfigurationError('missing host', 'database.host');
      expect(withPhase(original, 'driver')).toBe(original);
    });

    it('should wrap plain errors and keep the cause', () => {
      const cause = new Error('socket hang up');

      const wrapped = withPhase(cause, 'status');

      expect(wrapped).toBeInstanceOf(ChartwrightError);
      expect(wrapped.describe()).toBe('[status] socket hang up');
      expect(wrapped.cause).toBe(cause);
    });

    it('should wrap thrown values that are not errors', () => {
      expect(withPhase('boom', 'logs').describe()).toBe('[logs] boom');
      expect(toError(42).message).toBe('42');
    });
  });

  describe('Settings Validation Errors', () => {
    it('should point at the offending setting path', () => {
      const Settings = type({ application: { replicaCount: 'number' } });
      const result = Settings({ application: { replicaCount: 'many' } });
      if (!(result instanceof type.errors)) {
        throw new Error('expected validation to fail');
      }

      const error = formatSettingsValidationError(result, 'chart settings');

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error.settingPath).toBe('application.replicaCount');
      expect(error.phase).toBe('resolve');
      expect(error.message.startsWith('Invalid chart settings: ')).toBe(true);
      expect(error.problems).toHaveLength(1);
    });

    it('should number additional problems', () => {
      const Settings = type({ port: 'number', host: 'string' });
      const result = Settings({ port: 'x', host: 1 });
      if (!(result instanceof type.errors)) {
        throw new Error('expected validation to fail');
      }

      const error = formatSettingsValidationError(result);

      expect(error.problems).toHaveLength(2);
      expect(error.message).toContain('\n\nAdditional validation errors:\n  2. ');
      expect(error.message.startsWith('Invalid settings: ')).toBe(true);
    });
  });
});
