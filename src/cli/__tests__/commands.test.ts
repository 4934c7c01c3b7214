/**
 * Tests for CLI argument parsing
 */

import { describe, it, expect } from 'vitest';
import { parseCommand, parseOptions } from '../commands';
import { captureError } from '@/test/fixtures';

describe('parseOptions', () => {
  it('accepts --key=value and --key value forms and normalizes dashes', () => {
    expect(parseOptions('set_profile', ['--risk-tolerance=low', '--goals', 'buy a home'])).toEqual({
      risk_tolerance: 'low',
      goals: 'buy a home',
    });
  });

  it('keeps everything after the first = as the value', () => {
    expect(parseOptions('add_transaction', ['--description=a=b'])).toEqual({ description: 'a=b' });
  });

  it('reports stray arguments and missing values together', () => {
    const error = captureError(() => parseOptions('set_budget', ['Food', '--amount']));

    expect(error).toHaveProperty('code', 'InvalidArguments');
    expect(error).toHaveProperty('issues', ["unexpected argument 'Food'", '--amount requires a value']);
  });
});

describe('parseCommand', () => {
  it('defaults to help with no arguments', () => {
    expect(parseCommand([])).toEqual({ action: 'help' });
    expect(parseCommand(['--help'])).toEqual({ action: 'help' });
  });

  it('parses a report command with integer year and month', () => {
    expect(parseCommand(['report', '--year', '2024', '--month=3'])).toEqual({
      action: 'report',
      year: 2024,
      month: 3,
    });
  });

  it('parses add-transaction with the expense type by default', () => {
    expect(
      parseCommand(['add-transaction', '--amount=12.5', '--category', 'Food', '--description', 'Lunch'])
    ).toEqual({
      action: 'add_transaction',
      amount: 12.5,
      category: 'Food',
      description: 'Lunch',
      type: 'expense',
    });
  });

  it('parses an income transaction with a date', () => {
    expect(
      parseCommand([
        'add_transaction',
        '--amount', '5000',
        '--category', 'Income',
        '--description', 'Salary',
        '--type', 'income',
        '--date', '2024-03-01',
      ])
    ).toEqual({
      action: 'add_transaction',
      amount: 5000,
      category: 'Income',
      description: 'Salary',
      type: 'income',
      date: '2024-03-01',
    });
  });

  it('passes non-numeric amounts through as NaN for the core to reject', () => {
    const command = parseCommand(['set_budget', '--category', 'Food', '--amount', 'lots']);

    expect(command.action).toBe('set_budget');
    expect(command.action === 'set_budget' && Number.isNaN(command.amount)).toBe(true);
  });

  it.each(['0x10', ' ', '1e3', '12abc', 'Infinity'])('treats amount %j as not a number', amount => {
    const command = parseCommand(['set_budget', '--category=rent', `--amount=${amount}`]);

    expect(command.action === 'set_budget' && Number.isNaN(command.amount)).toBe(true);
  });

  it.each<[string, number]>([
    ['42', 42],
    [' 12.50 ', 12.5],
    ['.75', 0.75],
    ['-5', -5],
  ])('reads decimal amount %j as %d', (amount, expected) => {
    const command = parseCommand(['set_budget', '--category=rent', `--amount=${amount}`]);

    expect(command).toEqual({ action: 'set_budget', category: 'rent', amount: expected });
  });

  it('parses set_profile without judging the risk tolerance', () => {
    expect(parseCommand(['set_profile', '--risk_tolerance', 'extreme', '--goals', 'growth'])).toEqual({
      action: 'set_profile',
      risk_tolerance: 'extreme',
      goals: 'growth',
    });
  });

  it('rejects unknown actions', () => {
    const error = captureError(() => parseCommand(['frobnicate']));

    expect(error).toHaveProperty('code', 'UnknownAction');
    expect(error).toHaveProperty('message', "Unknown action 'frobnicate'. Run 'help' to list available actions.");
  });

  it('lists missing required options', () => {
    const error = captureError(() => parseCommand(['report', '--year', '2024']));

    expect(error).toHaveProperty('code', 'InvalidArguments');
    expect(error).toHaveProperty('message', "Invalid arguments for 'report': --month is required");
  });

  it('rejects non-integer periods', () => {
    const error = captureError(() => parseCommand(['report', '--year', '2024', '--month', 'March']));

    expect(error).toHaveProperty('issues', ['--month must be an integer']);
  });

  it('rejects unknown transaction types', () => {
    const error = captureError(() =>
      parseCommand(['add_transaction', '--amount=1', '--category=Food', '--description=x', '--type=refund'])
    );

    expect(error).toHaveProperty('code', 'InvalidArguments');
  });
});
