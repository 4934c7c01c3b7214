/**
 * Command parsing and dispatch for the CLI.
 *
 * Arguments are validated into a `Command` tagged union before any core
 * call is made. Domain rules (negative amounts, unknown risk tolerance, ...)
 * are still enforced by the core itself.
 */

import { z } from 'zod';
import { InvalidArgumentsError, UnknownActionError } from '@/lib/errors';
import type { FinanceSettings } from '@/lib/settings';
import type { FinanceStore } from '@/lib/stores';
import { formatCurrency } from '@/lib/utils';
import { formatReport } from './format';

export const ACTIONS = ['report', 'add_transaction', 'set_budget', 'set_profile', 'help'] as const;

export type ActionName = (typeof ACTIONS)[number];

const requiredText = (name: string) =>
  z.string({ required_error: `--${name} is required` }).min(1, `--${name} must not be empty`);

const DECIMAL_PATTERN = /^-?(?:\d+(?:\.\d+)?|\.\d+)$/;

// Anything that is not plain decimal text becomes NaN, which the core rejects as InvalidAmount
const amountArg = requiredText('amount').transform(value => {
  const text = value.trim();
  return DECIMAL_PATTERN.test(text) ? Number(text) : Number.NaN;
});

const integerArg = (name: string) =>
  requiredText(name).regex(/^-?\d+$/, `--${name} must be an integer`).transform(value => Number(value));

const reportSchema = z.object({
  action: z.literal('report'),
  year: integerArg('year'),
  month: integerArg('month'),
});

const addTransactionSchema = z.object({
  action: z.literal('add_transaction'),
  amount: amountArg,
  category: requiredText('category'),
  description: requiredText('description'),
  type: z.enum(['income', 'expense']).default('expense'),
  date: z.string().optional(),
});

const setBudgetSchema = z.object({
  action: z.literal('set_budget'),
  category: requiredText('category'),
  amount: amountArg,
});

const setProfileSchema = z.object({
  action: z.literal('set_profile'),
  risk_tolerance: requiredText('risk_tolerance'),
  goals: requiredText('goals'),
});

const helpSchema = z.object({
  action: z.literal('help'),
});

export const commandSchema = z.discriminatedUnion('action', [
  reportSchema,
  addTransactionSchema,
  setBudgetSchema,
  setProfileSchema,
  helpSchema,
]);

export type Command = z.infer<typeof commandSchema>;

export const USAGE = `
Personal finance assistant

Usage:
  finance-assistant <action> [--option=value | --option value]...

Actions:
  report           --year <yyyy> --month <1-12>
  add_transaction  --amount <n> --category <name> --description <text>
                   [--type income|expense] [--date yyyy-mm-dd]
  set_budget       --category <name> --amount <n>
  set_profile      --risk_tolerance low|medium|high --goals <text>
  help             Show this help message

Environment:
  FINANCE_DATA_FILE     JSON data file (default financial_data/financial_data.json)
  DATABASE_URL          Store data in Postgres instead of a file
  FINANCE_WORKSPACE_ID  Workspace key in Postgres (default "default")
  FINANCE_LOCALE        Locale for amounts (default en-US)
  FINANCE_CURRENCY      Currency code for amounts (default USD)
`.trim();

function normalizeName(raw: string): string {
  return raw.trim().toLowerCase().replace(/-/g, '_');
}

function isActionName(value: string): value is ActionName {
  return (ACTIONS as readonly string[]).includes(value);
}

/**
 * Collect `--key=value` and `--key value` pairs. Keys accept dashes or underscores.
 */
export function parseOptions(action: string, args: string[]): Record<string, string> {
  const options: Record<string, string> = {};
  const issues: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      issues.push(`unexpected argument '${arg}'`);
      continue;
    }

    const body = arg.slice(2);
    const separator = body.indexOf('=');
    if (separator >= 0) {
      options[normalizeName(body.slice(0, separator))] = body.slice(separator + 1);
      continue;
    }

    const next = args[i + 1];
    if (next === undefined || next.startsWith('--')) {
      issues.push(`--${body} requires a value`);
      continue;
    }
    options[normalizeName(body)] = next;
    i++;
  }

  if (issues.length > 0) {
    throw new InvalidArgumentsError(action, issues);
  }
  return options;
}

/**
 * Turn raw CLI arguments into a validated command
 */
export function parseCommand(argv: string[]): Command {
  const [rawAction, ...rest] = argv;
  if (rawAction === undefined || rawAction === '--help' || rawAction === '-h') {
    return { action: 'help' };
  }

  const action = normalizeName(rawAction);
  if (!isActionName(action)) {
    throw new UnknownActionError(rawAction);
  }

  const options = parseOptions(action, rest);
  const parsed = commandSchema.safeParse({ ...options, action });
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue =>
      issue.path.length > 0 && !issue.message.startsWith('--')
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message
    );
    throw new InvalidArgumentsError(action, issues);
  }
  return parsed.data;
}

export interface CommandContext {
  store: FinanceStore;
  settings: FinanceSettings;
}

/**
 * Run a command against the stored workspace and return the lines to print.
 * Mutating actions save the workspace only after the core call succeeds.
 */
export async function runCommand(command: Command, context: CommandContext): Promise<string[]> {
  const { store, settings } = context;

  switch (command.action) {
    case 'help':
      return [USAGE];

    case 'report': {
      const workspace = await store.load();
      const report = workspace.report(command.year, command.month);
      return formatReport(report, settings);
    }

    case 'add_transaction': {
      const workspace = await store.load();
      const transaction = workspace.ledger.addTransaction({
        amount: command.amount,
        category: command.category,
        description: command.description,
        type: command.type,
        date: command.date,
      });
      await store.save(workspace);
      return [
        `Recorded ${transaction.type} of ${formatCurrency(transaction.amount, settings)} ` +
          `in ${transaction.category} on ${transaction.date}.`,
      ];
    }

    case 'set_budget': {
      const workspace = await store.load();
      const entry = workspace.budgets.setBudget(command.category, command.amount);
      await store.save(workspace);
      return [`Budget for ${entry.category} set to ${formatCurrency(entry.limit, settings)}.`];
    }

    case 'set_profile': {
      const workspace = await store.load();
      const profile = workspace.profiles.setProfile(command.risk_tolerance, command.goals);
      await store.save(workspace);
      return [`Investment profile set: ${profile.riskTolerance} risk tolerance, goals "${profile.goals}".`];
    }
  }
}
