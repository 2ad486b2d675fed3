import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as XLSX from 'xlsx';
import { describe, expect, it } from 'vitest';
import { DossierSetupError } from '@dossier/common';
import { agentRow, captureLogger, ROSTER_COLUMNS, rosterCsv } from '../test/helpers.js';
import { decodeDelimitedText, detectRosterFormat, loadAgentRoster } from './record-loader.js';

const tempFile = async (name: string, body: string | Buffer): Promise<string> => {
  const dir = await mkdtemp(join(tmpdir(), 'dossier-roster-'));
  const path = join(dir, name);
  await writeFile(path, body);
  return path;
};

describe('detectRosterFormat', () => {
  it('maps spreadsheet extensions case-insensitively and treats the rest as delimited text', () => {
    expect(detectRosterFormat('agents.XLSX')).toBe('xlsx');
    expect(detectRosterFormat('agents.xls')).toBe('xls');
    expect(detectRosterFormat('agents.ods')).toBe('ods');
    expect(detectRosterFormat('agents.csv')).toBe('csv');
    expect(detectRosterFormat('agents.txt')).toBe('csv');
  });
});

describe('decodeDelimitedText', () => {
  it('drops a UTF-8 byte order mark', () => {
    const decoded = decodeDelimitedText(Buffer.from('\uFEFFName\n', 'utf8'));
    expect(decoded).toEqual({ text: 'Name\n', encoding: 'utf-8' });
  });

  it('falls back to Windows-1252 for bytes that are not UTF-8', () => {
    const decoded = decodeDelimitedText(Buffer.from([0x5a, 0x6f, 0xeb, 0x2c, 0x93, 0x68, 0x69, 0x94]));
    expect(decoded).toEqual({ text: 'Zoë,“hi”', encoding: 'windows-1252' });
  });
});

describe('loadAgentRoster', () => {
  it('keeps row order and separates valid from invalid rows', async () => {
    const path = await tempFile(
      'roster.csv',
      rosterCsv([agentRow('A'), agentRow('B', { Coffee: '' }), agentRow('C', { Anomaly: 'Whisper' })])
    );
    const { logger, entries } = captureLogger();

    const roster = await loadAgentRoster(path, logger);

    expect(roster.format).toBe('csv');
    expect(roster.encoding).toBe('utf-8');
    expect(roster.columns).toEqual(ROSTER_COLUMNS);
    expect(roster.rows.map((row) => [row.status, row.rowNumber])).toEqual([
      ['valid', 2],
      ['invalid', 3],
      ['valid', 4]
    ]);
    expect(roster.rows[1]).toEqual({ status: 'invalid', rowNumber: 3, label: 'B', missingFields: ['Coffee'] });

    const third = roster.rows[2];
    expect(third?.status === 'valid' && third.record.Anomaly).toBe('Whisper');

    const loaded = entries.find((entry) => entry.message === 'roster_loaded');
    expect(loaded?.meta).toMatchObject({ format: 'csv', rows: 3, valid: 2, invalid: 1 });
  });

  it('keeps cell text literally instead of parsing numbers', async () => {
    const path = await tempFile('roster.csv', rosterCsv([agentRow('Bond', { Annual_Salary: '007' })]));
    const { logger } = captureLogger();

    const [row] = (await loadAgentRoster(path, logger)).rows;

    expect(row?.status === 'valid' && row.record.Annual_Salary).toBe('007');
  });

  it('reads quoted cells that contain commas', async () => {
    const header = ROSTER_COLUMNS.join(',');
    const cells = ROSTER_COLUMNS.map((column) => (column === 'Looks' ? '"Tall, grey suit"' : `x${column}`));
    const path = await tempFile('roster.csv', `${header}\n${cells.join(',')}\n`);
    const { logger } = captureLogger();

    const [row] = (await loadAgentRoster(path, logger)).rows;

    expect(row?.status === 'valid' && row.record.Looks).toBe('Tall, grey suit');
  });

  it('labels a row without a name by its row number', async () => {
    const path = await tempFile('roster.csv', rosterCsv([agentRow('', { Looks: '' })]));
    const { logger } = captureLogger();

    const roster = await loadAgentRoster(path, logger);

    expect(roster.rows).toEqual([
      { status: 'invalid', rowNumber: 2, label: 'row 2', missingFields: ['Name', 'Looks'] }
    ]);
  });

  it('matches headers case-sensitively', async () => {
    const header = ROSTER_COLUMNS.map((column) => (column === 'Coffee' ? 'coffee' : column)).join(',');
    const cells = ROSTER_COLUMNS.map((column) => `v${column}`).join(',');
    const path = await tempFile('roster.csv', `${header}\n${cells}\n`);
    const { logger } = captureLogger();

    const roster = await loadAgentRoster(path, logger);

    expect(roster.rows).toEqual([
      { status: 'invalid', rowNumber: 2, label: 'vName', missingFields: ['Coffee'] }
    ]);
  });

  it('decodes a Windows-1252 roster', async () => {
    const path = await tempFile('roster.csv', Buffer.from(rosterCsv([agentRow('Zoë')]), 'latin1'));
    const { logger } = captureLogger();

    const roster = await loadAgentRoster(path, logger);

    expect(roster.encoding).toBe('windows-1252');
    const [row] = roster.rows;
    expect(row?.status === 'valid' && row.record.Name).toBe('Zoë');
  });

  it('warns about cells that look truncated', async () => {
    const path = await tempFile('roster.csv', rosterCsv([agentRow('Long', { Work_Experience: 'w'.repeat(256) })]));
    const { logger, entries } = captureLogger();

    await loadAgentRoster(path, logger);

    const warning = entries.find((entry) => entry.message === 'roster_cell_possibly_truncated');
    expect(warning?.meta).toMatchObject({ column: 'Work_Experience', row_number: 2, length: 256 });
  });

  it('reads the first sheet of an xlsx workbook', async () => {
    const row = agentRow('Sheet Agent');
    const sheet = XLSX.utils.aoa_to_sheet([
      ROSTER_COLUMNS,
      ROSTER_COLUMNS.map((column) => (column === 'Annual_Salary' ? 42000 : row[column] ?? ''))
    ]);
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, 'Agents');
    const body: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    const path = await tempFile('roster.xlsx', body);
    const { logger } = captureLogger();

    const roster = await loadAgentRoster(path, logger);

    expect(roster.format).toBe('xlsx');
    expect(roster.encoding).toBeNull();
    const [loaded] = roster.rows;
    expect(loaded?.status).toBe('valid');
    if (loaded?.status === 'valid') {
      expect(loaded.record.Name).toBe('Sheet Agent');
      expect(loaded.record.Annual_Salary).toBe('42000');
    }
  });

  it('raises a setup error for a missing file', async () => {
    const { logger } = captureLogger();
    const missing = join(tmpdir(), 'dossier-roster-missing', 'nope.csv');

    await expect(loadAgentRoster(missing, logger)).rejects.toBeInstanceOf(DossierSetupError);
    await expect(loadAgentRoster(missing, logger)).rejects.toThrow(/^INPUT_UNREADABLE: /);
  });
});
