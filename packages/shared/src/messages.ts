export type MessageTone = 'success' | 'info' | 'warning' | 'error';

export type MessageParams = Record<string, unknown>;

export type MessageDefinition = {
  key: string;
  title: string;
  body: string;
  tone: MessageTone;
};

const definitions: Record<string, MessageDefinition> = {
  'generator.started': {
    key: 'generator.started',
    title: 'Generator Ready',
    body: 'Writing fixtures to {{sourceDir}}; ledger at {{ledgerFile}}.',
    tone: 'info'
  },
  'generator.quit': {
    key: 'generator.quit',
    title: 'Generator Stopped',
    body: 'Quitting test data generator ({{appended}} appended, {{truncated}} truncated, {{failed}} failed).',
    tone: 'info'
  },
  'record.appended': {
    key: 'record.appended',
    title: 'Record Appended',
    body: 'Appended {{label}} CSV: {{preview}}',
    tone: 'success'
  },
  'ledger.truncated': {
    key: 'ledger.truncated',
    title: 'Ledger Truncated',
    body: 'CSV file {{ledgerFile}} truncated.',
    tone: 'success'
  },
  'action.failed': {
    key: 'action.failed',
    title: 'Action Failed',
    body: 'Error during {{label}}: {{reason}}',
    tone: 'error'
  },
  'record.unknownKind': {
    key: 'record.unknownKind',
    title: 'Unknown Record Kind',
    body: "Unknown {{family}} kind '{{kind}}'; falling back to the {{fallback}} shape.",
    tone: 'warning'
  },
  'upload.received': {
    key: 'upload.received',
    title: 'Upload Received',
    body: "Received file '{{fileName}}' ({{size}} bytes)",
    tone: 'info'
  },
  'upload.delayed': {
    key: 'upload.delayed',
    title: 'Upload Delayed',
    body: "Delaying response for file '{{fileName}}' by {{delayMs}} ms to simulate timeout...",
    tone: 'warning'
  }
};

function render(template: string, params?: MessageParams): string {
  if (!params) return template;
  return template.replace(/{{\s*([\w.]+)\s*}}/g, (_match, key: string) => {
    const value = params[key];
    if (value === null || value === undefined) return '';
    if (typeof value === 'number') return Number.isFinite(value) ? String(value) : '';
    return String(value);
  });
}

export function getMessageDefinition(key: string): MessageDefinition | undefined {
  return definitions[key];
}

export function formatAppMessage(
  key: string,
  params?: MessageParams
): { definition: MessageDefinition; title: string; body: string } {
  const definition = getMessageDefinition(key) ?? {
    key,
    title: key,
    body: '',
    tone: 'info' as MessageTone
  };
  const title = render(definition.title, params);
  const body = render(definition.body, params);
  return { definition, title, body };
}
