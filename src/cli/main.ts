import { isFinanceError } from '@/lib/errors';
import { loadSettings } from '@/lib/settings';
import { createStore, type FinanceStore } from '@/lib/stores';
import { USAGE, parseCommand, runCommand } from './commands';

/**
 * Run the CLI and return the process exit code
 */
export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let store: FinanceStore | undefined;

  try {
    const command = parseCommand(argv);
    if (command.action === 'help') {
      console.log(USAGE);
      return 0;
    }

    const settings = loadSettings(env);
    store = createStore(settings);
    const lines = await runCommand(command, { store, settings });
    for (const line of lines) {
      console.log(line);
    }
    return 0;
  } catch (error) {
    if (isFinanceError(error)) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    console.error('[CLI] Unexpected error:', error);
    return 1;
  } finally {
    if (store) {
      try {
        await store.close();
      } catch (error) {
        console.error('[CLI] Failed to close store:', error);
      }
    }
  }
}
