import type { StoredAnnotation } from "../adapters/DatasetAdapter.js";
import { INDEPENDENT, isErrorGroup } from "../domain/records.js";

export type RunSummary = {
  total: number;
  independent: number;
  grouped: number;
  errors: number;
  // Rows without any group value; outside the three buckets above.
  unresolved: number;
  verified: number;
};

export function summarize(annotations: StoredAnnotation[]): RunSummary {
  const s: RunSummary = { total: annotations.length, independent: 0, grouped: 0, errors: 0, unresolved: 0, verified: 0 };

  for (const a of annotations) {
    if (!a.group) s.unresolved++;
    else if (isErrorGroup(a.group)) s.errors++;
    else if (a.group === INDEPENDENT) s.independent++;
    else s.grouped++;

    if (a.verified.startsWith("Yes")) s.verified++;
  }
  return s;
}

export function pct(n: number, total: number): string {
  return total ? ((n / total) * 100).toFixed(1) : "0.0";
}

export function formatSummary(s: RunSummary): string[] {
  const lines = [
    `Total restaurants: ${s.total}`,
    `Independent: ${s.independent} (${pct(s.independent, s.total)}%)`,
    `Part of groups: ${s.grouped} (${pct(s.grouped, s.total)}%)`,
    `Verified: ${s.verified} (${pct(s.verified, s.total)}%)`
  ];
  if (s.errors > 0) lines.push(`Errors: ${s.errors} (${pct(s.errors, s.total)}%)`);
  if (s.unresolved > 0) lines.push(`Not processed: ${s.unresolved}`);
  return lines;
}
