import type { FinanceWorkspace } from '../workspace';

/**
 * Persists a workspace between runs. The record shape is the workspace
 * snapshot; how it is laid out in storage is up to each store.
 */
export interface FinanceStore {
  readonly kind: 'file' | 'postgres';
  load(): Promise<FinanceWorkspace>;
  save(workspace: FinanceWorkspace): Promise<void>;
  close(): Promise<void>;
}
