export {
  DATABASE_SERVICE_NAME,
  type DatabaseAddress,
  DEFAULT_DATABASE_PORT,
  databaseMode,
  resolveDatabaseAddress,
} from './database-address.js';
