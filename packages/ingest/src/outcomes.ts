import type { BatchCounts, RecordOutcome } from "../../schema/src/index.js";

export function emptyCounts(): BatchCounts {
  return { inserted: 0, skipped: 0, errors: 0 };
}

export function tallyOutcome(counts: BatchCounts, outcome: RecordOutcome): BatchCounts {
  switch (outcome.kind) {
    case "inserted":
      return { ...counts, inserted: counts.inserted + 1 };
    case "skipped":
      return { ...counts, skipped: counts.skipped + 1 };
    case "error":
      return { ...counts, errors: counts.errors + 1 };
  }
}

export function tallyOutcomes(outcomes: Iterable<RecordOutcome>): BatchCounts {
  let counts = emptyCounts();
  for (const o of outcomes) counts = tallyOutcome(counts, o);
  return counts;
}

export function formatCounts(c: BatchCounts): string {
  return `inserted=${c.inserted}, skipped=${c.skipped}, errors=${c.errors}`;
}
