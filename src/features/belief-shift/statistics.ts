import type { ArguerStyle, GroundTruth, ResultRecord, SideLabel, SummaryRow } from "./types";

/** Arithmetic mean. */
export function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Sample variance (Bessel's correction: n-1). */
export function variance(values: number[]): number {
  const m = mean(values);
  return values.reduce((sum, v) => sum + (v - m) ** 2, 0) / (values.length - 1);
}

/** Sample standard deviation. */
export function standardDeviation(values: number[]): number {
  return Math.sqrt(variance(values));
}

interface GroupKey {
  groundTruth: GroundTruth;
  side: SideLabel;
  style: ArguerStyle;
}

function compareKeys(a: GroupKey, b: GroupKey): number {
  return (
    a.groundTruth.localeCompare(b.groundTruth) ||
    a.side.localeCompare(b.side) ||
    a.style.localeCompare(b.style)
  );
}

/**
 * Groups shifts by (ground truth, side, style). Rows come back sorted by
 * those keys; a single-record group has an sd of NaN.
 */
export function summarizeShifts(records: readonly ResultRecord[]): SummaryRow[] {
  const groups = new Map<string, { key: GroupKey; shifts: number[] }>();

  for (const record of records) {
    const id = `${record.groundTruth}|${record.side}|${record.style}`;
    let group = groups.get(id);
    if (!group) {
      group = {
        key: { groundTruth: record.groundTruth, side: record.side, style: record.style },
        shifts: [],
      };
      groups.set(id, group);
    }
    group.shifts.push(record.shift);
  }

  return [...groups.values()]
    .sort((a, b) => compareKeys(a.key, b.key))
    .map(({ key, shifts }) => ({
      ...key,
      mean: mean(shifts),
      sd: standardDeviation(shifts),
      count: shifts.length,
    }));
}
