/**
 * Dependency Wiring
 *
 * The database address the application and the migration task connect to.
 * Derived from settings and naming only; there is no runtime discovery.
 */

import { ConfigurationError } from '../errors.js';
import { fullName } from '../naming/index.js';
import type { SettingsTree } from '../settings/index.js';
import type { DatabaseMode, ReleaseIdentity } from '../types/index.js';
import { isNonEmptyString } from '../../utils/index.js';

/**
 * Component-local name of the headless Service fronting the bundled database.
 * The StatefulSet's own name is never used as an address.
 */
export const DATABASE_SERVICE_NAME = 'postgres-headless';

export const DEFAULT_DATABASE_PORT = 5432;

export interface DatabaseAddress {
  host: string;
  port: number;
  mode: DatabaseMode;
}

/**
 * Effective mode: a disabled database is always an external reference
 */
export function databaseMode(settings: SettingsTree): DatabaseMode {
  if (settings.get('database.enabled') === false) {
    return 'external';
  }
  return settings.get('database.mode') === 'external' ? 'external' : 'bundled';
}

export function resolveDatabaseAddress(settings: SettingsTree, identity: ReleaseIdentity): DatabaseAddress {
  const configuredPort = settings.get('database.port');
  const port = typeof configuredPort === 'number' ? configuredPort : DEFAULT_DATABASE_PORT;
  const mode = databaseMode(settings);

  if (mode === 'bundled') {
    return { host: fullName(identity.name, DATABASE_SERVICE_NAME), port, mode };
  }

  const host = settings.get('database.host');
  if (!isNonEmptyString(host)) {
    throw new ConfigurationError(
      'External database mode requires database.host to be set',
      'database.host'
    );
  }
  return { host, port, mode };
}
