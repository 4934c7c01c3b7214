/**
 * Postgres-backed store. Each workspace is one JSONB row in
 * `finance_workspaces`, keyed by workspace id.
 */

import { Pool } from 'pg';
import { FinanceWorkspace, type WorkspaceOptions } from '../workspace';
import type { FinanceStore } from './types';

export interface PostgresStoreOptions {
  connectionString: string;
  workspaceId: string;
  workspaceOptions?: WorkspaceOptions;
}

export class PostgresStore implements FinanceStore {
  readonly kind = 'postgres' as const;
  private readonly pool: Pool;
  private readonly workspaceId: string;
  private readonly workspaceOptions: WorkspaceOptions;
  private initialized = false;

  constructor(options: PostgresStoreOptions) {
    this.pool = new Pool({ connectionString: options.connectionString, max: 2 });
    this.workspaceId = options.workspaceId;
    this.workspaceOptions = options.workspaceOptions ?? {};
  }

  /**
   * Create the table on first use
   */
  private async ensureTable(): Promise<void> {
    if (this.initialized) return;

    const startTime = Date.now();
    try {
      await this.pool.query(`
        CREATE TABLE IF NOT EXISTS finance_workspaces (
          id VARCHAR(64) PRIMARY KEY,
          snapshot JSONB NOT NULL,
          updated_at TIMESTAMP WITH TIME ZONE DEFAULT NOW()
        )
      `);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      console.error('[Store] Failed to initialize finance_workspaces table:', { error: errorMessage });
      throw new Error(`Database initialization failed: ${errorMessage}`, { cause: error });
    }

    this.initialized = true;
    console.log(`[Store] Postgres table ready in ${Date.now() - startTime}ms`);
  }

  async load(): Promise<FinanceWorkspace> {
    await this.ensureTable();

    const result = await this.pool.query<{ snapshot: unknown }>(
      'SELECT snapshot FROM finance_workspaces WHERE id = $1',
      [this.workspaceId]
    );

    if (result.rows.length === 0) {
      console.log(`[Store] Workspace ${this.workspaceId} not found in Postgres, starting empty`);
      return new FinanceWorkspace(this.workspaceOptions);
    }

    console.log(`[Store] Workspace ${this.workspaceId} retrieved from Postgres`);
    return FinanceWorkspace.fromSnapshot(result.rows[0].snapshot, this.workspaceOptions);
  }

  async save(workspace: FinanceWorkspace): Promise<void> {
    await this.ensureTable();

    const snapshot = workspace.toSnapshot();
    await this.pool.query(
      `INSERT INTO finance_workspaces (id, snapshot, updated_at)
       VALUES ($1, $2::jsonb, NOW())
       ON CONFLICT (id) DO UPDATE SET snapshot = EXCLUDED.snapshot, updated_at = NOW()`,
      [this.workspaceId, JSON.stringify(snapshot)]
    );
    console.log(`[Store] Workspace ${this.workspaceId} saved to Postgres`, {
      transactions: snapshot.transactions.length,
      budgets: snapshot.budgets.length,
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
