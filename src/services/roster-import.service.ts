import { parse } from 'csv-parse/sync';
import type { AuditRepositoryPort } from './ports/audit.repository.port';
import type { AuditSession, PersonRecord } from '../types/audit.types';
import { decodeUpload, type DetectedEncoding, type EncodingHint } from '../utils/encoding.utils';
import { CapacityError, ConflictError, SchemaError } from '../utils/errors';
import { ErrorCodes } from '../types/api.types';
import { logger } from '../utils/logger';

export const REQUIRED_COLUMNS = ['name', 'grade', 'advisor'] as const;
export const OPTIONAL_COLUMNS = ['username'] as const;
export const MISSING_ADVISOR = 'Missing';

/** First data row is row 2; the header is row 1. */
const FIRST_DATA_ROW = 2;

export interface DuplicateGroup {
  name: string;
  grade: string;
  advisor: string;
  count: number;
  rows: number[];
}

export interface ImportPreview {
  kind: 'ok' | 'duplicates';
  encoding: DetectedEncoding;
  rowCount: number;
  persons: PersonRecord[];
  duplicateGroups: DuplicateGroup[];
}

export interface FinalizeImportResult {
  session: AuditSession;
  personCount: number;
  droppedDuplicates: number;
  encoding: DetectedEncoding;
}

export interface RosterImportOptions {
  maxRows: number;
}

type ColumnName = (typeof REQUIRED_COLUMNS)[number] | (typeof OPTIONAL_COLUMNS)[number];

interface ParsedLine {
  cells: string[];
  line: number;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function toCells(value: unknown): string[] {
  return Array.isArray(value) ? value.map((cell) => (typeof cell === 'string' ? cell : String(cell ?? ''))) : [];
}

// csv-parse with `info: true` yields { record, info } where info.lines is the file line the record ends on
function toParsedLines(output: unknown): ParsedLine[] {
  if (!Array.isArray(output)) return [];
  return output.map((entry: unknown, index: number) => {
    const info = isObject(entry) ? entry.info : undefined;
    return {
      cells: toCells(isObject(entry) ? entry.record : undefined),
      line: isObject(info) && typeof info.lines === 'number' ? info.lines : index + 1,
    };
  });
}

export function identityKey(person: Pick<PersonRecord, 'name' | 'grade' | 'advisor'>): string {
  return [person.name, person.grade, person.advisor].map((v) => v.trim().toLowerCase()).join('\u0000');
}

/** `lineNumbers[i]` is the file line of `persons[i]`; without it rows are numbered from 2. */
export function findDuplicateGroups(persons: PersonRecord[], lineNumbers: readonly number[] = []): DuplicateGroup[] {
  const groups = new Map<string, DuplicateGroup>();
  persons.forEach((person, index) => {
    const key = identityKey(person);
    const row = lineNumbers[index] ?? index + FIRST_DATA_ROW;
    const existing = groups.get(key);
    if (existing) {
      existing.count += 1;
      existing.rows.push(row);
    } else {
      groups.set(key, { name: person.name, grade: person.grade, advisor: person.advisor, count: 1, rows: [row] });
    }
  });
  return [...groups.values()].filter((group) => group.count > 1);
}

export function dropDuplicates(persons: PersonRecord[]): PersonRecord[] {
  const seen = new Set<string>();
  return persons.filter((person) => {
    const key = identityKey(person);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export class RosterImportService {
  constructor(private readonly repository: AuditRepositoryPort, private readonly options: RosterImportOptions) {}

  /** Parses and validates an upload without touching storage. */
  validateAndPreview(bytes: Buffer, opts: { encoding?: EncodingHint } = {}): ImportPreview {
    const { text, encoding } = decodeUpload(bytes, opts.encoding ?? 'auto');
    const { persons, lines } = this.parseRoster(text);
    const duplicateGroups = findDuplicateGroups(persons, lines);
    return {
      kind: duplicateGroups.length > 0 ? 'duplicates' : 'ok',
      encoding,
      rowCount: persons.length,
      persons,
      duplicateGroups,
    };
  }

  async finalizeImport(
    bytes: Buffer,
    opts: { creator: string; confirmDuplicates: boolean; encoding?: EncodingHint }
  ): Promise<FinalizeImportResult> {
    const preview = this.validateAndPreview(bytes, { encoding: opts.encoding });
    if (preview.kind === 'duplicates' && !opts.confirmDuplicates) {
      throw new ConflictError(
        'Roster contains duplicate entries; confirm to keep the first occurrence of each',
        { duplicateGroups: preview.duplicateGroups },
        ErrorCodes.DUPLICATES_UNCONFIRMED
      );
    }

    const persons = dropDuplicates(preview.persons);
    const session = await this.repository.createSessionWithPersons(opts.creator, persons);
    const droppedDuplicates = preview.persons.length - persons.length;
    logger.info('audit-session-created', {
      sessionId: session.id,
      creator: opts.creator,
      personCount: persons.length,
      droppedDuplicates,
      encoding: preview.encoding,
    });
    return { session, personCount: persons.length, droppedDuplicates, encoding: preview.encoding };
  }

  private parseRoster(text: string): { persons: PersonRecord[]; lines: number[] } {
    let records: ParsedLine[];
    try {
      const output: unknown = parse(text, {
        skip_empty_lines: true,
        relax_column_count: true,
        bom: true,
        info: true,
      });
      records = toParsedLines(output);
    } catch (error) {
      throw new SchemaError('Roster file is not valid CSV', {
        reason: error instanceof Error ? error.message : String(error),
      });
    }

    const [header, ...rows] = records;
    if (rows.length > this.options.maxRows) {
      throw new CapacityError(`Roster exceeds the maximum of ${this.options.maxRows} rows`, {
        maxRows: this.options.maxRows,
        rowCount: rows.length,
      });
    }

    const columns = this.resolveColumns(header?.cells ?? []);
    if (rows.length === 0) {
      throw new SchemaError('Roster file contains no data rows', { rowCount: 0 });
    }

    const rowErrors: string[] = [];
    const persons: PersonRecord[] = [];
    for (const { cells, line } of rows) {
      const cell = (column: ColumnName): string => {
        const position = columns.get(column);
        return position === undefined ? '' : (cells[position] ?? '').trim();
      };
      const person: PersonRecord = {
        name: cell('name'),
        grade: cell('grade'),
        advisor: cell('advisor') || MISSING_ADVISOR,
        username: cell('username'),
      };
      for (const required of ['name', 'grade'] as const) {
        if (!person[required]) rowErrors.push(`Row ${line}: Missing value for ${required}`);
      }
      persons.push(person);
    }

    if (rowErrors.length > 0) {
      throw new SchemaError(`Roster has ${rowErrors.length} invalid row(s)`, { rowErrors });
    }
    return { persons, lines: rows.map((row) => row.line) };
  }

  private resolveColumns(header: string[]): Map<ColumnName, number> {
    const normalized = header.map((h) => h.trim().toLowerCase());
    const columns = new Map<ColumnName, number>();
    for (const column of [...REQUIRED_COLUMNS, ...OPTIONAL_COLUMNS]) {
      const position = normalized.indexOf(column);
      if (position >= 0) columns.set(column, position);
    }
    const missingColumns = REQUIRED_COLUMNS.filter((column) => !columns.has(column)).sort();
    if (missingColumns.length > 0) {
      throw new SchemaError(`Roster is missing required column(s): ${missingColumns.join(', ')}`, {
        missingColumns,
        foundColumns: header.map((h) => h.trim()).filter((h) => h.length > 0),
      });
    }
    return columns;
  }
}
