import type { ResultRecord } from "@/features/belief-shift/types";

export function createMockResultRecord(overrides?: Partial<ResultRecord>): ResultRecord {
  const credStart = overrides?.credStart ?? 40;
  const credEnd = overrides?.credEnd ?? 60;
  return {
    proposition: "Test proposition",
    groundTruth: "unknown",
    side: "true",
    style: "default",
    credStart,
    credEnd,
    shift: credEnd - credStart,
    ...overrides,
  };
}
