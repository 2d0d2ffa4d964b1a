import { existsSync, mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { Action, GeneratorConfig } from '../../packages/shared/src';
import { createScriptedSelectorSource } from '../../packages/main/src/input/selectorSource';
import {
  describeAction,
  performAction,
  renderMenu,
  resolveAction,
  runDispatchLoop,
  SELECTOR_BINDINGS,
  type DispatchDeps
} from '../../packages/main/src/services/dispatch';
import { parseFixtureFileName } from '../../packages/main/src/services/fixtureName';
import { countLedgerLines, createLedger } from '../../packages/main/src/services/ledger';
import { digestOf, FIXED_PAYLOAD_DIGEST as DIGEST } from '../../packages/main/src/services/payload';

const clock = () => new Date(1_700_000_000_000);

describe('selector mapping', () => {
  it('maps every documented key to its action', () => {
    expect(resolveAction(' ')).toEqual({ kind: 'valid' });
    expect(resolveAction('1')).toEqual({ kind: 'malformed', error: 'missing_field' });
    expect(resolveAction('2')).toEqual({ kind: 'malformed', error: 'empty_path' });
    expect(resolveAction('3')).toEqual({ kind: 'malformed', error: 'extra_row' });
    expect(resolveAction('4')).toEqual({ kind: 'malformed', error: 'garbled' });
    expect(resolveAction('r')).toEqual({ kind: 'invalidPath', fail: 'relative' });
    expect(resolveAction('o')).toEqual({ kind: 'invalidPath', fail: 'outside' });
    expect(resolveAction('t')).toEqual({ kind: 'truncate' });
    expect(resolveAction('q')).toEqual({ kind: 'quit' });
    expect(resolveAction('\u0003')).toEqual({ kind: 'quit' });
  });

  it('accepts upper-case letters and ignores everything else', () => {
    expect(resolveAction('R')).toEqual({ kind: 'invalidPath', fail: 'relative' });
    expect(resolveAction('Q')).toEqual({ kind: 'quit' });
    expect(resolveAction('5')).toBeNull();
    expect(resolveAction('x')).toBeNull();
    expect(resolveAction('\u001b')).toBeNull();
  });

  it('labels actions for operator output', () => {
    const cases: Array<[Action, string]> = [
      [{ kind: 'valid' }, 'valid'],
      [{ kind: 'malformed', error: 'garbled' }, 'error (garbled)'],
      [{ kind: 'invalidPath', fail: 'outside' }, 'fail (outside path)'],
      [{ kind: 'truncate' }, 'truncate']
    ];
    for (const [action, label] of cases) {
      expect(describeAction(action)).toBe(label);
    }
  });

  it('renders the key menu from the binding table', () => {
    const menu = renderMenu({ sourceDir: '/abs/src', ledgerFile: '/abs/csv/SHA256-HASH.csv' }).split('\n');
    expect(menu[1]).toBe('  Source Directory: /abs/src');
    expect(menu[2]).toBe('  CSV File: /abs/csv/SHA256-HASH.csv');
    expect(menu).toContain('    SPACE : Create VALID file and append valid CSV record.');
    expect(menu).toContain("    4     : Append 'garbled' invalid CSV record.");
    expect(menu).toContain('    Ctrl+C: Quit.');
  });
});

describe('dispatch loop', () => {
  let tempDir: string;
  let config: GeneratorConfig;
  let deps: DispatchDeps;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'pcapgen-dispatch-'));
    const ledgerDir = join(tempDir, 'csv');
    mkdirSync(ledgerDir);
    config = {
      configPath: join(tempDir, 'config.ini'),
      sourceDir: join(tempDir, 'src'),
      ledgerDir,
      ledgerFileName: 'SHA256-HASH.csv',
      ledgerFile: join(ledgerDir, 'SHA256-HASH.csv'),
      logLevel: null
    };
    deps = { config, ledger: createLedger(config.ledgerFile), clock };
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  const ledgerText = () => (existsSync(config.ledgerFile) ? readFileSync(config.ledgerFile, 'utf8') : '');

  it('writes a fixture and a record that points at it', async () => {
    const outcome = await performAction({ kind: 'valid' }, deps);

    const expectedPath = join(config.sourceDir, 'MAH11-20231114-221320.pcap');
    expect(outcome).toEqual({ kind: 'appended', label: 'valid', text: `1700000000,${expectedPath},${DIGEST}\n` });
    expect(ledgerText()).toBe(`1700000000,${expectedPath},${DIGEST}\n`);

    const [epoch, path, digest] = ledgerText().trimEnd().split(',');
    expect(path.startsWith(`${config.sourceDir}/`)).toBe(true);
    expect(digestOf(readFileSync(path))).toBe(digest);
    expect(parseFixtureFileName(basename(path))?.getTime()).toBe(Number(epoch) * 1000);
  });

  it('appends nothing when the fixture cannot be written', async () => {
    writeFileSync(join(tempDir, 'blocker'), 'file');
    const blocked: DispatchDeps = { ...deps, config: { ...config, sourceDir: join(tempDir, 'blocker', 'src') } };

    const outcome = await performAction({ kind: 'valid' }, blocked);

    expect(outcome.kind).toBe('failed');
    if (outcome.kind === 'failed') {
      expect(outcome.label).toBe('valid');
      expect(outcome.error.code).toBe('fixture.writeFailed');
    }
    expect(ledgerText()).toBe('');
  });

  it('writes no fixture for malformed or invalid-path records', async () => {
    await performAction({ kind: 'malformed', error: 'empty_path' }, deps);
    await performAction({ kind: 'invalidPath', fail: 'outside' }, deps);

    expect(existsSync(config.sourceDir)).toBe(false);
    const [emptyPath, outside] = ledgerText().trimEnd().split('\n');
    expect(emptyPath).toBe(`1700000000,,${DIGEST}`);
    const outsidePath = outside.split(',')[1];
    expect(outsidePath.startsWith('/')).toBe(true);
    expect(outsidePath.startsWith(config.sourceDir)).toBe(false);
  });

  it('gives every bound record action a non-empty record', async () => {
    const recordBindings = SELECTOR_BINDINGS.filter((b) => b.action.kind !== 'truncate' && b.action.kind !== 'quit');
    expect(recordBindings.map((b) => b.key)).toEqual([' ', '1', '2', '3', '4', 'r', 'o']);

    for (const binding of recordBindings) {
      const outcome = await performAction(binding.action, deps);
      expect(outcome.kind).toBe('appended');
      if (outcome.kind === 'appended') expect(outcome.text.endsWith('\n')).toBe(true);
    }
  });

  it('only grows the ledger until an explicit truncate', async () => {
    const actions: Action[] = [
      { kind: 'valid' },
      { kind: 'malformed', error: 'extra_row' },
      { kind: 'malformed', error: 'missing_field' },
      { kind: 'invalidPath', fail: 'relative' },
      { kind: 'malformed', error: 'garbled' }
    ];
    const counts: number[] = [];
    for (const action of actions) {
      await performAction(action, deps);
      counts.push(countLedgerLines(ledgerText()));
    }
    expect(counts).toEqual([1, 3, 4, 5, 7]);

    expect(await performAction({ kind: 'truncate' }, deps)).toEqual({ kind: 'truncated' });
    expect(ledgerText()).toBe('');
  });

  it('runs until quit, ignoring unknown keys', async () => {
    const source = createScriptedSelectorSource([' ', '1', 'x', '2', '3', '4', 'r', 'o', 'q', ' ']);

    const summary = await runDispatchLoop(source, deps);

    expect(summary).toEqual({ appended: 7, truncated: 0, failed: 0, ignored: 1 });
    expect(countLedgerLines(ledgerText())).toBe(9);
    expect(readdirSync(config.sourceDir)).toEqual(['MAH11-20231114-221320.pcap']);
    // The key after quit is never read.
    expect(await source.next()).toBe(' ');
  });

  it('stops when the source runs dry and counts truncates and failures', async () => {
    const failing: DispatchDeps = { ...deps, ledger: createLedger(join(tempDir, 'missing', 'ledger.csv')) };
    const summary = await runDispatchLoop(createScriptedSelectorSource(['t', '1', 'T']), failing);
    expect(summary).toEqual({ appended: 0, truncated: 0, failed: 3, ignored: 0 });

    const ok = await runDispatchLoop(createScriptedSelectorSource(['1', 't', '2']), deps);
    expect(ok).toEqual({ appended: 2, truncated: 1, failed: 0, ignored: 0 });
    expect(ledgerText()).toBe(`1700000000,,${DIGEST}\n`);
  });
});
