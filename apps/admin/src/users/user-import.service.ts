import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import type { ValidationError } from 'class-validator';
import { parse } from 'csv-parse/sync';
import { AccountsService, UsernameTakenException } from '@gatehouse/auth';
import { ImportRowDto } from './dto';

/** The part of an uploaded file the import reads */
export interface CsvUpload {
  originalname: string;
  buffer: Buffer;
}

export interface ImportReport {
  successCount: number;
  errors: string[];
}

interface CsvRow {
  /** 1-based line in the file, header included */
  line: number;
  fields: Record<string, unknown>;
}

/**
 * UserImportService — bulk account creation from CSV files.
 *
 * Columns are matched by header name, case-insensitively:
 * - `username` (required)
 * - `password` (falls back to IMPORT_DEFAULT_PASSWORD when empty)
 * - `is_admin` (`true`/`false`, empty means false)
 *
 * Other columns are ignored. Each row goes through
 * `AccountsService.register()`, so hashing and the duplicate check are
 * the same as for a single account. A bad row is reported and skipped;
 * rows already created stay created. A store outage aborts the whole
 * request.
 */
@Injectable()
export class UserImportService {
  private readonly logger = new Logger(UserImportService.name);

  constructor(
    private readonly accountsService: AccountsService,
    private readonly configService: ConfigService,
  ) {}

  async importFiles(files: readonly CsvUpload[]): Promise<ImportReport> {
    const report: ImportReport = { successCount: 0, errors: [] };

    for (const file of files) {
      const name = file.originalname;

      if (!name.toLowerCase().endsWith('.csv')) {
        this.reject(report, `File "${name}" is not a CSV file`);
        continue;
      }

      let rows: CsvRow[];
      try {
        rows = parseCsv(file.buffer);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        this.reject(report, `File "${name}" could not be parsed: ${reason}`);
        continue;
      }

      for (const row of rows) {
        await this.importRow(name, row, report);
      }
    }

    this.logger.log(
      `CSV import finished: ${report.successCount} created, ${report.errors.length} failed`,
    );
    return report;
  }

  private async importRow(file: string, row: CsvRow, report: ImportReport): Promise<void> {
    const where = `${file} line ${row.line}`;
    const username = row.fields.username;

    if (typeof username !== 'string' || username === '') {
      this.reject(report, `${where}: username is required`);
      return;
    }

    const password = nonEmpty(row.fields.password) ?? this.defaultPassword();
    if (password === undefined) {
      this.reject(report, `${where}: password is required`);
      return;
    }

    const dto = plainToInstance(ImportRowDto, {
      username,
      password,
      is_admin: row.fields.is_admin ?? '',
    });
    const problems = await validate(dto);
    if (problems.length > 0) {
      this.reject(report, `${where}: ${listConstraints(problems)}`);
      return;
    }

    try {
      await this.accountsService.register(dto.username, dto.password, {
        isAdmin: dto.is_admin,
      });
      report.successCount++;
    } catch (error) {
      if (error instanceof UsernameTakenException) {
        this.reject(report, `${where}: user "${dto.username}" already exists`);
        return;
      }
      throw error;
    }
  }

  private defaultPassword(): string | undefined {
    return nonEmpty(this.configService.get<string>('IMPORT_DEFAULT_PASSWORD'));
  }

  private reject(report: ImportReport, message: string): void {
    report.errors.push(message);
    this.logger.warn(`CSV import: ${message}`);
  }
}

function nonEmpty(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseCsv(input: Buffer): CsvRow[] {
  const parsed: unknown = parse(input, {
    columns: (header: unknown[]) =>
      header.map((column) => String(column).trim().toLowerCase()),
    bom: true,
    info: true,
    relax_column_count: true,
    skip_empty_lines: true,
    trim: true,
  });

  if (!Array.isArray(parsed)) {
    return [];
  }

  return parsed.flatMap((entry: unknown): CsvRow[] =>
    isRecord(entry) &&
    isRecord(entry.record) &&
    isRecord(entry.info) &&
    typeof entry.info.lines === 'number'
      ? [{ line: entry.info.lines, fields: entry.record }]
      : [],
  );
}

function listConstraints(problems: ValidationError[]): string {
  return problems
    .flatMap((problem) => Object.values(problem.constraints ?? {}))
    .join('; ');
}
