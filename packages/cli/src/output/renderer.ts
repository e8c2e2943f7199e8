import pc from 'picocolors';
import {
  AppError,
  stubPackageName,
  toRecordRow,
  type PackageRecord,
  type PackageRecordRow,
  type ResolutionError,
} from '@typecensus/shared';
import type { Outcome } from '@typecensus/core';

export interface FailureRow {
  package: string;
  error: {
    code: string;
    message: string;
  };
}

export type ResultRow = PackageRecordRow | FailureRow;

export interface CheckSummary {
  total: number;
  resolved: number;
  failed: number;
  cancelled: number;
}

export interface CheckReport {
  results: ResultRow[];
  summary: CheckSummary;
}

function causeCode(error: ResolutionError): string {
  return error.cause instanceof AppError ? error.cause.code : 'UnknownError';
}

export function toFailureRow(error: ResolutionError): FailureRow {
  return {
    package: error.packageName,
    error: { code: causeCode(error), message: error.message },
  };
}

export function buildReport(outcomes: Outcome[]): CheckReport {
  const summary: CheckSummary = { total: outcomes.length, resolved: 0, failed: 0, cancelled: 0 };
  const results = outcomes.map((outcome): ResultRow => {
    if (outcome.ok) {
      summary.resolved++;
      return toRecordRow(outcome.record);
    }
    if (causeCode(outcome.error) === 'Cancelled') {
      summary.cancelled++;
    } else {
      summary.failed++;
    }
    return toFailureRow(outcome.error);
  });
  return { results, summary };
}

function formatStub(value: boolean | null): string {
  if (value === null) return pc.yellow('unknown');
  return value ? pc.green('yes') : pc.dim('no');
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  renderOutcomes(outcomes: Outcome[]): CheckReport {
    const report = buildReport(outcomes);
    if (this.isJson) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      this.renderHuman(outcomes, report.summary);
    }
    return report;
  }

  private renderHuman(outcomes: Outcome[], summary: CheckSummary): void {
    const width = Math.max(
      0,
      ...outcomes.map((outcome) =>
        outcome.ok ? outcome.record.package.length : outcome.error.packageName.length,
      ),
    );

    for (const outcome of outcomes) {
      if (outcome.ok) {
        this.renderRecord(outcome.record, width);
      } else {
        console.log(
          `${pc.red('✖')} ${outcome.error.packageName.padEnd(width)}  ${pc.red(
            describeCause(outcome.error),
          )}`,
        );
      }
    }

    const parts = [pc.green(`${summary.resolved} resolved`)];
    if (summary.failed > 0) parts.push(pc.red(`${summary.failed} failed`));
    if (summary.cancelled > 0) parts.push(pc.yellow(`${summary.cancelled} cancelled`));
    console.log(`\n${pc.bold(`${summary.total} packages:`)} ${parts.join(', ')}`);
  }

  private renderRecord(record: PackageRecord, width: number): void {
    const marker = record.hasPyTyped ? pc.green('yes') : pc.dim('no');
    console.log(
      `${pc.green('✔')} ${record.package.padEnd(width)}  py.typed: ${marker}  ${stubPackageName(
        record.package,
      )}: ${formatStub(record.hasTypesPackage)}`,
    );
  }
}

function describeCause(error: ResolutionError): string {
  return error.cause instanceof Error ? error.cause.message : error.message;
}
