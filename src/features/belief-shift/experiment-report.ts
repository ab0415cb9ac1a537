import { withSpan, logInfo } from "@/lib/telemetry";
import type { FailedDebateRecord, ResultRecord, SummaryRow } from "./types";

type ExperimentReport = {
  model: string;
  rounds: number;
  seed?: number | undefined;
  records: ResultRecord[];
  failures: FailedDebateRecord[];
  summary: SummaryRow[];
  timestamp: string;
};

function generateExperimentReport(options: {
  model: string;
  rounds: number;
  seed?: number | undefined;
  records: ResultRecord[];
  failures: FailedDebateRecord[];
  summary: SummaryRow[];
}): ExperimentReport {
  return withSpan("generate-experiment-report", "belief_shift", () => {
    logInfo("Generating experiment report", {
      model: options.model,
      records: options.records.length,
      failures: options.failures.length,
    });
    return {
      ...options,
      timestamp: new Date().toISOString(),
    };
  });
}

function formatNumber(value: number): string {
  return Number.isNaN(value) ? "-" : value.toFixed(2);
}

function truncate(text: string, width: number): string {
  return text.length > width ? `${text.slice(0, width - 1)}…` : text;
}

function formatResultsTable(records: readonly ResultRecord[]): string {
  const separator = "-".repeat(110);
  const header = [
    "Proposition".padEnd(48),
    "Truth".padEnd(8),
    "Side".padEnd(6),
    "Style".padEnd(11),
    "Start".padEnd(8),
    "End".padEnd(8),
    "Shift".padEnd(8),
  ].join(" | ");

  const rows = records.map((r) =>
    [
      truncate(r.proposition, 48).padEnd(48),
      r.groundTruth.padEnd(8),
      r.side.padEnd(6),
      r.style.padEnd(11),
      formatNumber(r.credStart).padEnd(8),
      formatNumber(r.credEnd).padEnd(8),
      ((r.shift >= 0 ? "+" : "") + formatNumber(r.shift)).padEnd(8),
    ].join(" | "),
  );

  return ["All results:", separator, header, separator, ...rows, separator].join("\n");
}

function formatSummaryTable(summary: readonly SummaryRow[]): string {
  const separator = "-".repeat(70);
  const header = [
    "Truth".padEnd(8),
    "Side".padEnd(6),
    "Style".padEnd(11),
    "Mean".padEnd(10),
    "SD".padEnd(10),
    "Count".padEnd(6),
  ].join(" | ");

  const rows = summary.map((s) =>
    [
      s.groundTruth.padEnd(8),
      s.side.padEnd(6),
      s.style.padEnd(11),
      formatNumber(s.mean).padEnd(10),
      formatNumber(s.sd).padEnd(10),
      String(s.count).padEnd(6),
    ].join(" | "),
  );

  return [
    "Summary of belief shifts by truth, side & style:",
    separator,
    header,
    separator,
    ...rows,
    separator,
  ].join("\n");
}

function formatFailures(failures: readonly FailedDebateRecord[]): string {
  if (failures.length === 0) return "";
  const lines = failures.map(
    (f) => `  ${f.style}/${f.side} "${truncate(f.proposition, 60)}": ${f.errorTag}: ${f.message}`,
  );
  return [`Failed debates (${failures.length}):`, ...lines].join("\n");
}

function formatReport(report: ExperimentReport): string {
  const header = `Model: ${report.model} | Rounds: ${report.rounds} | Debates: ${report.records.length + report.failures.length} | Seed: ${report.seed ?? "random"}`;
  const sections = [header, formatResultsTable(report.records), formatSummaryTable(report.summary)];
  const failures = formatFailures(report.failures);
  if (failures) sections.push(failures);
  return sections.join("\n\n");
}

export { generateExperimentReport, formatResultsTable, formatSummaryTable, formatFailures, formatReport };
export type { ExperimentReport };
