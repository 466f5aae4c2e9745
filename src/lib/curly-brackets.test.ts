import { describe, expect, test } from 'vitest';
import { CurlyBrackets } from './curly-brackets';

describe('CurlyBrackets', () => {
  test('replaces placeholders', () => {
    expect(
      CurlyBrackets('Restarting {{name}} in {{delayMS}}ms', {
        name: 'db',
        delayMS: 2000,
      }),
    ).toBe('Restarting db in 2000ms');
  });

  test('walks dotted keys into nested values', () => {
    expect(
      CurlyBrackets('{{name}} exited with {{exit.code}} ({{exit.signal}})', {
        name: 'store',
        exit: { code: 137, signal: 'SIGKILL' },
      }),
    ).toBe('store exited with 137 (SIGKILL)');
  });

  test('uses the fallback for missing values', () => {
    expect(CurlyBrackets('{{name}} is {{health}}', { name: 'db' })).toBe(
      'db is (null)',
    );
    expect(CurlyBrackets('{{name}} is {{health}}', { name: null }, '?')).toBe(
      '? is ?',
    );
  });

  test('joins arrays and renders errors and objects', () => {
    expect(
      CurlyBrackets('Starting {{services}}: {{error}} {{port}}', {
        services: ['db', 'store'],
        error: new Error('refused'),
        port: { host: 5555, container: 80 },
      }),
    ).toBe('Starting db, store: refused {"host":5555,"container":80}');
  });

  test('keeps escaped placeholders literally', () => {
    expect(CurlyBrackets('\\{{name}} is {{name}}', { name: 'db' })).toBe(
      '{{name}} is db',
    );
  });

  test('returns text without placeholders unchanged', () => {
    expect(CurlyBrackets('Press Ctrl+C to stop', { name: 'db' })).toBe(
      'Press Ctrl+C to stop',
    );
    expect(CurlyBrackets()).toBe('');
  });
});
