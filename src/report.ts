// src/report.ts
import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import type { DuplicateSummary } from "./duplicates.js";
import type { DuplicateMap, IndexStats } from "./index-store.js";
import type { LargeFileDetail } from "./maintenance.js";
import type { ResolveOutcome } from "./resolve.js";

const numberFormatter = new Intl.NumberFormat("en-US");

export function humanFileSize(bytes: number): string {
  if (!Number.isFinite(bytes)) return "-";
  const sign = bytes < 0 ? -1 : 1;
  let value = Math.abs(bytes);
  const units = ["B", "KiB", "MiB", "GiB", "TiB", "PiB", "EiB"];
  let unitIndex = 0;
  while (value >= 1024 && unitIndex < units.length - 1) {
    value /= 1024;
    unitIndex += 1;
  }
  const formatted = value >= 10 ? value.toFixed(1) : value.toFixed(2);
  return `${sign < 0 ? "-" : ""}${formatted.replace(/\.0+$/, "")} ${units[unitIndex]}`;
}

function leftAligned(table: AsciiTable3, columns: number): AsciiTable3 {
  // ascii-table3 columns are 1-based
  for (let idx = 1; idx <= columns; idx += 1) {
    table.setAlign(idx, AlignmentEnum.LEFT);
  }
  return table;
}

export function renderDuplicateGroups(groups: DuplicateMap): string[] {
  const lines: string[] = [];
  for (const [digest, paths] of groups) {
    lines.push(`Duplicate files for hash ${digest}:`);
    for (const p of paths) {
      lines.push(` - ${p}`);
    }
  }
  return lines;
}

export function renderDuplicateSummaries(
  summaries: readonly DuplicateSummary[],
): string[] {
  return summaries.flatMap(({ digest, paths, reclaimable }) => [
    ...renderDuplicateGroups(new Map([[digest, paths]])),
    `Reclaimable: ${humanFileSize(reclaimable)}`,
  ]);
}

export function renderLargeFiles(rows: readonly LargeFileDetail[]): string {
  const table = leftAligned(
    new AsciiTable3("Large Files")
      .setHeading("Path", "Size", "Last Modified")
      .setStyle("unicode-round"),
    3,
  );
  for (const row of rows) {
    table.addRow(
      row.path,
      `${numberFormatter.format(row.size)} (${humanFileSize(row.size)})`,
      row.modified,
    );
  }
  return table.toString();
}

export function renderStats(stats: IndexStats): string {
  const summary = leftAligned(
    new AsciiTable3("Index Statistics")
      .setHeading("Field", "Value")
      .setStyle("unicode-round"),
    2,
  );
  summary.addRow("Total files", numberFormatter.format(stats.totalFiles));
  summary.addRow(
    "Unique file types",
    numberFormatter.format(stats.uniqueFileTypes),
  );
  summary.addRow(
    "Total size",
    stats.totalSize == null
      ? "-"
      : `${numberFormatter.format(stats.totalSize)} (${humanFileSize(stats.totalSize)})`,
  );
  const kinds = Object.entries(stats.fileTypeDistribution);
  if (!kinds.length) return summary.toString();

  const distribution = leftAligned(
    new AsciiTable3("File Types")
      .setHeading("Type", "Files")
      .setStyle("unicode-round"),
    2,
  );
  for (const [kind, n] of kinds) {
    distribution.addRow(kind, numberFormatter.format(n));
  }
  return `${summary.toString()}\n${distribution.toString()}`;
}

export function renderOutcome(outcome: ResolveOutcome): string[] {
  switch (outcome.status) {
    case "resolved": {
      const verb = outcome.dryRun ? "Would delete" : "Deleted";
      return outcome.deleted.map((p) => `${verb} file: ${p}`);
    }
    case "skipped":
      return [`Skipped ${outcome.digest}: ${outcome.reason}`];
    case "failed":
      return [`Failed ${outcome.digest}: ${outcome.error.message}`];
  }
}
