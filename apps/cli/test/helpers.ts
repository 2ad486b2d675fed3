import { createJsonLogger, type JsonValue, type Logger } from '@dossier/common';
import { OPTIONAL_AGENT_FIELDS, REQUIRED_AGENT_FIELDS, type RawAgentRow } from '@dossier/contracts';

export interface LogEntry {
  level: string;
  message: string;
  meta?: Record<string, JsonValue>;
}

const isLogEntry = (value: unknown): value is LogEntry =>
  typeof value === 'object' &&
  value !== null &&
  'level' in value &&
  typeof value.level === 'string' &&
  'message' in value &&
  typeof value.message === 'string';

export const captureLogger = (): { logger: Logger; entries: LogEntry[]; messages: () => string[] } => {
  const entries: LogEntry[] = [];
  const logger = createJsonLogger({
    level: 'debug',
    sink: {
      write: (line: string) => {
        const parsed: unknown = JSON.parse(line);
        if (isLogEntry(parsed)) entries.push(parsed);
      }
    }
  });
  return { logger, entries, messages: () => entries.map((entry) => entry.message) };
};

export const ROSTER_COLUMNS: string[] = [...REQUIRED_AGENT_FIELDS, ...OPTIONAL_AGENT_FIELDS];

/** A complete row: every required field filled, optional fields left out. */
export const agentRow = (name: string, overrides: RawAgentRow = {}): RawAgentRow => ({
  ...Object.fromEntries(REQUIRED_AGENT_FIELDS.map((field) => [field, `${name} ${field.toLowerCase()}`])),
  Name: name,
  ...overrides
});

/** CSV text with the standard header. Cells here must not need quoting. */
export const rosterCsv = (rows: RawAgentRow[]): string =>
  [ROSTER_COLUMNS.join(','), ...rows.map((row) => ROSTER_COLUMNS.map((column) => row[column] ?? '').join(','))].join(
    '\n'
  ) + '\n';
