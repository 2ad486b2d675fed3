import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import * as XLSX from 'xlsx';
import { DossierSetupError, errorMessage, type Logger } from '@dossier/common';
import {
  validateAgentRow,
  type AgentRecord,
  type RawAgentRow,
  type RequiredAgentField
} from '@dossier/contracts';

export type RosterFormat = 'csv' | 'xlsx' | 'xls' | 'ods';
export type TextEncoding = 'utf-8' | 'windows-1252';

export type LoadedRow =
  | { status: 'valid'; rowNumber: number; record: AgentRecord }
  | { status: 'invalid'; rowNumber: number; label: string; missingFields: RequiredAgentField[] };

export interface LoadedRoster {
  path: string;
  format: RosterFormat;
  encoding: TextEncoding | null;
  columns: string[];
  rows: LoadedRow[];
}

// Cells this long were most likely cut off by a legacy spreadsheet export.
const TRUNCATION_LENGTHS = new Set([255, 256]);

export const detectRosterFormat = (filePath: string): RosterFormat => {
  switch (extname(filePath).toLowerCase()) {
    case '.xlsx':
      return 'xlsx';
    case '.xls':
      return 'xls';
    case '.ods':
      return 'ods';
    default:
      return 'csv';
  }
};

/** Strict UTF-8 first (BOM dropped), Windows-1252 when the bytes are not valid UTF-8. */
export const decodeDelimitedText = (buffer: Buffer): { text: string; encoding: TextEncoding } => {
  try {
    return { text: new TextDecoder('utf-8', { fatal: true }).decode(buffer), encoding: 'utf-8' };
  } catch {
    return { text: new TextDecoder('windows-1252').decode(buffer), encoding: 'windows-1252' };
  }
};

const cellText = (value: unknown): string => {
  if (typeof value === 'string') return value;
  if (value == null) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value);
};

const rowLabel = (row: RawAgentRow, rowNumber: number): string => {
  const name = row.Name;
  return name !== undefined && name.trim().length > 0 ? name : `row ${rowNumber}`;
};

const readWorkbook = (buffer: Buffer, format: RosterFormat): { workbook: XLSX.WorkBook; encoding: TextEncoding | null } => {
  if (format === 'csv') {
    const { text, encoding } = decodeDelimitedText(buffer);
    // raw: every cell stays the literal text of the file.
    return { workbook: XLSX.read(text, { type: 'string', raw: true }), encoding };
  }
  return { workbook: XLSX.read(buffer, { type: 'buffer' }), encoding: null };
};

export const loadAgentRoster = async (filePath: string, logger: Logger): Promise<LoadedRoster> => {
  const format = detectRosterFormat(filePath);

  let buffer: Buffer;
  try {
    buffer = await readFile(filePath);
  } catch (error) {
    throw new DossierSetupError('INPUT_UNREADABLE', `${filePath}: ${errorMessage(error)}`);
  }

  let parsed: { workbook: XLSX.WorkBook; encoding: TextEncoding | null };
  try {
    parsed = readWorkbook(buffer, format);
  } catch (error) {
    throw new DossierSetupError('INPUT_UNREADABLE', `${filePath}: ${errorMessage(error)}`);
  }

  const sheetName = parsed.workbook.SheetNames[0];
  const sheet = sheetName !== undefined ? parsed.workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    throw new DossierSetupError('INPUT_EMPTY_WORKBOOK', `${filePath} has no sheets`);
  }

  if (format === 'xls') {
    logger.warn('roster_xls_cell_limit', {
      path: filePath,
      hint: '.xls caps cells at 255 characters; prefer .ods or .xlsx'
    });
  }

  const ref = sheet['!ref'];
  const firstRow = ref ? XLSX.utils.decode_range(ref).s.r : 0;
  const grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: '',
    raw: false,
    blankrows: true
  });

  const [headerCells = [], ...bodyRows] = grid;
  const columns = headerCells.map(cellText);

  const seen = new Set<string>();
  for (const column of columns) {
    if (column.length > 0 && seen.has(column)) {
      logger.warn('roster_duplicate_column', { path: filePath, column });
    }
    seen.add(column);
  }

  const rows: LoadedRow[] = [];

  bodyRows.forEach((cells, index) => {
    // Spreadsheet row numbers: the header sits on firstRow + 1.
    const rowNumber = firstRow + index + 2;
    const values = cells.map(cellText);
    if (values.every((value) => value.trim().length === 0)) {
      return;
    }

    const taken = new Set<string>();
    const entries: Array<[string, string]> = [];
    columns.forEach((column, columnIndex) => {
      if (column.length === 0 || taken.has(column)) return;
      taken.add(column);
      const value = values[columnIndex] ?? '';
      entries.push([column, value]);

      if (TRUNCATION_LENGTHS.has(value.length)) {
        logger.warn('roster_cell_possibly_truncated', {
          path: filePath,
          column,
          row_number: rowNumber,
          length: value.length
        });
      }
    });

    const raw: RawAgentRow = Object.fromEntries(entries);
    const validation = validateAgentRow(raw);
    rows.push(
      validation.ok
        ? { status: 'valid', rowNumber, record: validation.record }
        : { status: 'invalid', rowNumber, label: rowLabel(raw, rowNumber), missingFields: validation.missingFields }
    );
  });

  const valid = rows.filter((row) => row.status === 'valid').length;

  logger.info('roster_loaded', {
    path: filePath,
    format,
    encoding: parsed.encoding,
    sheet: sheetName ?? null,
    rows: rows.length,
    valid,
    invalid: rows.length - valid
  });

  return {
    path: filePath,
    format,
    encoding: parsed.encoding,
    columns,
    rows
  };
};
