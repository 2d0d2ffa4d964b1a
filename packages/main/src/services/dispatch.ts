import { okAsync, type ResultAsync } from 'neverthrow';
import { formatAppMessage, type Action, type AppError, type GeneratorConfig, type MessageParams } from '../../../shared/src';
import type { SelectorSource } from '../input/selectorSource';
import { logger } from '../logger';
import { sampleTime, systemClock, type Clock } from './fixtureName';
import { writeFixture } from './fixtureWriter';
import type { Ledger } from './ledger';
import {
  createRecordContext,
  formatInvalidPathRecord,
  formatMalformedRecord,
  formatValidRecord,
  type RecordContext
} from './recordFormat';

type SelectorBinding = {
  key: string;
  keyLabel: string;
  action: Action;
  help: string;
};

/** Single table behind both the key menu and the dispatch lookup. */
export const SELECTOR_BINDINGS: readonly SelectorBinding[] = [
  { key: ' ', keyLabel: 'SPACE', action: { kind: 'valid' }, help: 'Create VALID file and append valid CSV record.' },
  { key: '1', keyLabel: '1', action: { kind: 'malformed', error: 'missing_field' }, help: "Append 'missing_field' invalid CSV record." },
  { key: '2', keyLabel: '2', action: { kind: 'malformed', error: 'empty_path' }, help: "Append 'empty_path' invalid CSV record." },
  { key: '3', keyLabel: '3', action: { kind: 'malformed', error: 'extra_row' }, help: "Append 'extra_row' invalid CSV record." },
  { key: '4', keyLabel: '4', action: { kind: 'malformed', error: 'garbled' }, help: "Append 'garbled' invalid CSV record." },
  { key: 'r', keyLabel: 'r', action: { kind: 'invalidPath', fail: 'relative' }, help: "Append 'relative' path invalid CSV record." },
  { key: 'o', keyLabel: 'o', action: { kind: 'invalidPath', fail: 'outside' }, help: "Append 'outside' path invalid CSV record." },
  { key: 't', keyLabel: 't', action: { kind: 'truncate' }, help: 'Truncate (empty) the CSV file.' },
  { key: 'q', keyLabel: 'q', action: { kind: 'quit' }, help: 'Quit.' },
  // Raw mode delivers Ctrl+C as a plain character instead of a signal.
  { key: '\u0003', keyLabel: 'Ctrl+C', action: { kind: 'quit' }, help: 'Quit.' }
];

const SELECTOR_ACTIONS: ReadonlyMap<string, Action> = new Map(SELECTOR_BINDINGS.map((b) => [b.key, b.action]));

export function resolveAction(selector: string): Action | null {
  return SELECTOR_ACTIONS.get(selector.toLowerCase()) ?? null;
}

export function describeAction(action: Action): string {
  switch (action.kind) {
    case 'valid':
      return 'valid';
    case 'malformed':
      return `error (${action.error})`;
    case 'invalidPath':
      return `fail (${action.fail} path)`;
    case 'truncate':
      return 'truncate';
    case 'quit':
      return 'quit';
  }
}

export function renderMenu(config: Pick<GeneratorConfig, 'sourceDir' | 'ledgerFile'>): string {
  const row = (b: SelectorBinding) => `    ${b.keyLabel.padEnd(6)}: ${b.help}`;
  const group = (kind: Action['kind']) => SELECTOR_BINDINGS.filter((b) => b.action.kind === kind).map(row);
  return [
    'Test Data Generator:',
    `  Source Directory: ${config.sourceDir}`,
    `  CSV File: ${config.ledgerFile}`,
    'Press key for action:',
    ...group('valid'),
    '  Error Record Types (CSV format errors):',
    ...group('malformed'),
    '  Failure Record Types (File path errors):',
    ...group('invalidPath'),
    '  Other Actions:',
    ...group('truncate'),
    ...group('quit'),
    ''
  ].join('\n');
}

export type DispatchDeps = {
  config: GeneratorConfig;
  ledger: Ledger;
  clock?: Clock;
  records?: RecordContext;
};

export type ActionOutcome =
  | { kind: 'appended'; label: string; text: string }
  | { kind: 'truncated' }
  | { kind: 'failed'; label: string; error: AppError }
  | { kind: 'quit' };

export type DispatchSummary = {
  appended: number;
  truncated: number;
  failed: number;
  ignored: number;
};

type RecordAction = Exclude<Action, { kind: 'truncate' } | { kind: 'quit' }>;

function formatRecord(action: RecordAction, deps: DispatchDeps, records: RecordContext): ResultAsync<string, AppError> {
  const sample = sampleTime(deps.clock ?? systemClock);
  switch (action.kind) {
    case 'valid':
      // No fixture, no record: a failed write short-circuits before the formatter runs.
      return writeFixture(deps.config.sourceDir, sample).map((fixture) => formatValidRecord(fixture, records.digest));
    case 'malformed':
      return okAsync<string, AppError>(formatMalformedRecord(action.error, sample, records));
    case 'invalidPath':
      return okAsync<string, AppError>(formatInvalidPathRecord(action.fail, sample, records));
    default: {
      // A new Action kind must be routed here or excluded from RecordAction.
      const unhandled: never = action;
      throw new Error(`No record formatter for action ${JSON.stringify(unhandled)}`);
    }
  }
}

/**
 * Runs one action to completion. Truncate never appends; every other recognised action
 * appends exactly the text its formatter produced.
 */
export async function performAction(action: Action, deps: DispatchDeps): Promise<ActionOutcome> {
  const label = describeAction(action);
  if (action.kind === 'quit') return { kind: 'quit' };
  if (action.kind === 'truncate') {
    return deps.ledger.truncate().match<ActionOutcome>(
      () => ({ kind: 'truncated' }),
      (error) => ({ kind: 'failed', label, error })
    );
  }

  const records = deps.records ?? createRecordContext(deps.config);
  return formatRecord(action, deps, records)
    .andThen((text) => deps.ledger.append(text).map(() => text))
    .match<ActionOutcome>(
      (text) => ({ kind: 'appended', label, text }),
      (error) => ({ kind: 'failed', label, error })
    );
}

function emit(key: string, params: MessageParams, context?: Record<string, unknown>) {
  const { definition, body } = formatAppMessage(key, params);
  const bindings = { event: key, ...(context ?? {}) };
  if (definition.tone === 'error') logger.error(bindings, body);
  else if (definition.tone === 'warning') logger.warn(bindings, body);
  else logger.info(bindings, body);
}

export function reportOutcome(outcome: ActionOutcome, config: Pick<GeneratorConfig, 'ledgerFile'>) {
  switch (outcome.kind) {
    case 'appended':
      emit('record.appended', { label: outcome.label, preview: outcome.text.trim() });
      break;
    case 'truncated':
      emit('ledger.truncated', { ledgerFile: config.ledgerFile });
      break;
    case 'failed':
      emit('action.failed', { label: outcome.label, reason: outcome.error.message }, { err: outcome.error });
      break;
    case 'quit':
      break;
  }
}

/**
 * The control loop. It has one state, WAITING: take a selector, perform its action,
 * report, repeat. Unknown selectors are ignored. Quit, or an exhausted source, ends it.
 */
export async function runDispatchLoop(source: SelectorSource, deps: DispatchDeps): Promise<DispatchSummary> {
  const summary: DispatchSummary = { appended: 0, truncated: 0, failed: 0, ignored: 0 };
  const resolved: DispatchDeps = { ...deps, records: deps.records ?? createRecordContext(deps.config) };

  for (;;) {
    const selector = await source.next();
    if (selector === null) break;

    const action = resolveAction(selector);
    if (!action) {
      summary.ignored += 1;
      continue;
    }

    const outcome = await performAction(action, resolved);
    if (outcome.kind === 'quit') break;
    reportOutcome(outcome, resolved.config);
    if (outcome.kind === 'appended') summary.appended += 1;
    else if (outcome.kind === 'truncated') summary.truncated += 1;
    else summary.failed += 1;
  }

  emit('generator.quit', { ...summary });
  return summary;
}
