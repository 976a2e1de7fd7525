/**
 * Run summary: which samples succeeded, were skipped or failed at each stage
 */

import { describeError, type ZeroDenominatorError } from "../errors";
import type { AggregateResult } from "../operations/aggregate";
import type { StageReport } from "./dispatcher";

export type SummaryStatus = "completed" | "skipped" | "planned" | "failed";

export interface SummaryRow {
  readonly stage: string;
  readonly sample: string;
  readonly status: SummaryStatus;
  readonly detail: string;
}

export const SUMMARY_HEADER = "#stage\tsample\tstatus\tdetail";

export function stageSummaryRows(report: StageReport): SummaryRow[] {
  return report.outcomes.map((outcome): SummaryRow => {
    const base = { stage: report.stage, sample: outcome.job.sample };
    switch (outcome.status) {
      case "skipped":
        return { ...base, status: "skipped", detail: outcome.job.outputPath };
      case "planned":
        return { ...base, status: "planned", detail: outcome.commandLine };
      case "completed":
        return { ...base, status: "completed", detail: outcome.job.outputPath };
      case "failed":
        return { ...base, status: "failed", detail: describeError(outcome.error) };
    }
  });
}

export function aggregateSummaryRows(stage: string, result: AggregateResult): SummaryRow[] {
  const rows: SummaryRow[] = [];
  const seen = new Set<string>();
  for (const record of result.records) {
    if (seen.has(record.sample)) continue;
    seen.add(record.sample);
    rows.push({ stage, sample: record.sample, status: "completed", detail: result.outputPath });
  }
  for (const failure of result.failures) {
    rows.push({
      stage,
      sample: failure.sample,
      status: "failed",
      detail: describeError(failure.error),
    });
  }
  return rows;
}

export function proportionSummaryRows(
  stage: string,
  samples: Iterable<string>,
  outputPath: string,
  failures: ReadonlyArray<ZeroDenominatorError>
): SummaryRow[] {
  const rows: SummaryRow[] = [];
  for (const sample of samples) {
    rows.push({ stage, sample, status: "completed", detail: outputPath });
  }
  for (const failure of failures) {
    rows.push({ stage, sample: failure.sample, status: "failed", detail: describeError(failure) });
  }
  return rows;
}

export function formatSummaryTable(rows: ReadonlyArray<SummaryRow>): string {
  const lines = [SUMMARY_HEADER];
  for (const row of rows) {
    lines.push(`${row.stage}\t${row.sample}\t${row.status}\t${row.detail}`);
  }
  return `${lines.join("\n")}\n`;
}

export const hasFailures = (rows: ReadonlyArray<SummaryRow>): boolean =>
  rows.some((row) => row.status === "failed");
