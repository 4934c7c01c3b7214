import type { FinanceSettings } from '../settings';
import type { WorkspaceOptions } from '../workspace';
import { JsonFileStore } from './jsonFileStore';
import { PostgresStore } from './postgresStore';
import type { FinanceStore } from './types';

export { JsonFileStore } from './jsonFileStore';
export { PostgresStore } from './postgresStore';
export type { FinanceStore } from './types';

/**
 * Pick the store the settings call for
 */
export function createStore(settings: FinanceSettings, workspaceOptions: WorkspaceOptions = {}): FinanceStore {
  if (settings.store === 'postgres' && settings.databaseUrl) {
    return new PostgresStore({
      connectionString: settings.databaseUrl,
      workspaceId: settings.workspaceId,
      workspaceOptions,
    });
  }
  return new JsonFileStore(settings.dataFile, workspaceOptions);
}
