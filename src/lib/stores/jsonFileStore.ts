/**
 * File-backed store: the workspace snapshot as pretty-printed JSON.
 * A missing file loads as an empty workspace.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { InvalidSnapshotError } from '../errors';
import { FinanceWorkspace, type WorkspaceOptions } from '../workspace';
import type { FinanceStore } from './types';

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class JsonFileStore implements FinanceStore {
  readonly kind = 'file' as const;

  constructor(
    readonly filePath: string,
    private readonly workspaceOptions: WorkspaceOptions = {}
  ) {}

  async load(): Promise<FinanceWorkspace> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        console.log(`[Store] No data file at ${this.filePath}, starting with an empty workspace`);
        return new FinanceWorkspace(this.workspaceOptions);
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidSnapshotError(`${this.filePath} is not valid JSON (${reason})`);
    }

    const workspace = FinanceWorkspace.fromSnapshot(raw, this.workspaceOptions);
    console.log(`[Store] Loaded workspace from ${this.filePath}`, {
      transactions: workspace.ledger.size,
      budgets: workspace.budgets.size,
    });
    return workspace;
  }

  async save(workspace: FinanceWorkspace): Promise<void> {
    const snapshot = workspace.toSnapshot();
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, `${JSON.stringify(snapshot, null, 2)}\n`, 'utf8');
    console.log(`[Store] Saved workspace to ${this.filePath}`, {
      transactions: snapshot.transactions.length,
      budgets: snapshot.budgets.length,
    });
  }

  async close(): Promise<void> {
    // Nothing held open between calls
  }
}
