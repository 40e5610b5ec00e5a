import type { CounterPolicy } from "./config";
import type { CounterAnomaly, Increment, Snapshot } from "./types";

export const DEFAULT_COUNTER_POLICY: CounterPolicy = { mode: "clamp", resetDropRatio: 0.5 };

function step(prev: number, next: number, policy: CounterPolicy): { increment: number; anomaly: CounterAnomaly | null } {
  if (next >= prev) return { increment: next - prev, anomaly: null };

  if (policy.mode === "reset_baseline" && next <= prev * policy.resetDropRatio) {
    // Counter restarted from zero; everything it shows now happened after the reset.
    return { increment: next, anomaly: "reset" };
  }
  return { increment: 0, anomaly: "decrease" };
}

/**
 * Turn one torrent's absolute counters into non-negative increments, one per
 * snapshot. The first snapshot only sets the baseline and contributes 0.
 */
export function deltas(snapshots: readonly Snapshot[], policy: CounterPolicy = DEFAULT_COUNTER_POLICY): Increment[] {
  const ordered = [...snapshots].sort((a, b) => a.observedAt.getTime() - b.observedAt.getTime());
  const result: Increment[] = [];

  for (let i = 0; i < ordered.length; i++) {
    const current = ordered[i];
    if (i === 0) {
      result.push({ torrentId: current.torrentId, observedAt: current.observedAt, increment: 0, anomaly: null });
      continue;
    }
    const { increment, anomaly } = step(ordered[i - 1].downloads, current.downloads, policy);
    result.push({ torrentId: current.torrentId, observedAt: current.observedAt, increment, anomaly });
  }

  return result;
}

/** Group a mixed snapshot list by torrent and compute each torrent's increments. */
export function deltasByTorrent(
  snapshots: readonly Snapshot[],
  policy: CounterPolicy = DEFAULT_COUNTER_POLICY,
): Map<string, Increment[]> {
  const grouped = new Map<string, Snapshot[]>();
  for (const snapshot of snapshots) {
    const list = grouped.get(snapshot.torrentId);
    if (list) list.push(snapshot);
    else grouped.set(snapshot.torrentId, [snapshot]);
  }

  const result = new Map<string, Increment[]>();
  for (const id of [...grouped.keys()].sort()) {
    result.set(id, deltas(grouped.get(id) ?? [], policy));
  }
  return result;
}

export function countAnomalies(byTorrent: ReadonlyMap<string, readonly Increment[]>): Record<CounterAnomaly, number> {
  const counts: Record<CounterAnomaly, number> = { decrease: 0, reset: 0 };
  for (const increments of byTorrent.values()) {
    for (const inc of increments) {
      if (inc.anomaly) counts[inc.anomaly]++;
    }
  }
  return counts;
}

export function totalIncrement(increments: readonly Increment[]): number {
  return increments.reduce((sum, inc) => sum + inc.increment, 0);
}
