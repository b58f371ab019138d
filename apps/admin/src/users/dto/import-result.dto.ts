import { Expose } from 'class-transformer';

/** Totals across every uploaded file, plus one message per failed row or file */
export class ImportResultDto {
  @Expose({ name: 'success_count' })
  successCount: number;

  @Expose({ name: 'error_count' })
  errorCount: number;

  errors: string[];

  private constructor(successCount: number, errorCount: number, errors: string[]) {
    this.successCount = successCount;
    this.errorCount = errorCount;
    this.errors = errors;
  }

  static fromReport(report: {
    successCount: number;
    errors: readonly string[];
  }): ImportResultDto {
    return new ImportResultDto(report.successCount, report.errors.length, [
      ...report.errors,
    ]);
  }
}
