import { describe, expect, it } from "vitest";
import { countAnomalies, deltas, deltasByTorrent, totalIncrement } from "../../scripts/pipeline/delta-calculator";
import { snap } from "../fixtures/builders";

describe("deltas", () => {
  it("clamps decreases to zero and flags them", () => {
    const result = deltas([
      snap("a", "2025-10-06T00:00:00Z", 100),
      snap("a", "2025-10-06T06:00:00Z", 80),
      snap("a", "2025-10-06T12:00:00Z", 130),
    ]);

    expect(result.map((d) => d.increment)).toEqual([0, 0, 50]);
    expect(result.map((d) => d.anomaly)).toEqual([null, "decrease", null]);
  });

  it("orders snapshots by time first", () => {
    const result = deltas([
      snap("a", "2025-10-07T00:00:00Z", 40),
      snap("a", "2025-10-06T00:00:00Z", 10),
    ]);
    expect(result.map((d) => [d.observedAt.toISOString(), d.increment])).toEqual([
      ["2025-10-06T00:00:00.000Z", 0],
      ["2025-10-07T00:00:00.000Z", 30],
    ]);
  });

  it("returns nothing for no snapshots", () => {
    expect(deltas([])).toEqual([]);
  });

  describe("reset_baseline policy", () => {
    const policy = { mode: "reset_baseline" as const, resetDropRatio: 0.5 };

    it("counts the post-reset value after a large drop", () => {
      const result = deltas([
        snap("a", "2025-10-06T00:00:00Z", 1000),
        snap("a", "2025-10-06T06:00:00Z", 20),
        snap("a", "2025-10-06T12:00:00Z", 50),
      ], policy);
      expect(result.map((d) => d.increment)).toEqual([0, 20, 30]);
      expect(result.map((d) => d.anomaly)).toEqual([null, "reset", null]);
    });

    it("still clamps small dips", () => {
      const result = deltas([
        snap("a", "2025-10-06T00:00:00Z", 1000),
        snap("a", "2025-10-06T06:00:00Z", 900),
      ], policy);
      expect(result.map((d) => d.increment)).toEqual([0, 0]);
      expect(result[1].anomaly).toBe("decrease");
    });
  });
});

describe("deltasByTorrent", () => {
  it("groups mixed snapshots and counts anomalies", () => {
    const byTorrent = deltasByTorrent([
      snap("b", "2025-10-06T00:00:00Z", 5),
      snap("a", "2025-10-06T00:00:00Z", 10),
      snap("b", "2025-10-06T06:00:00Z", 3),
      snap("a", "2025-10-06T06:00:00Z", 25),
    ]);

    expect([...byTorrent.keys()]).toEqual(["a", "b"]);
    expect(totalIncrement(byTorrent.get("a") ?? [])).toBe(15);
    expect(totalIncrement(byTorrent.get("b") ?? [])).toBe(0);
    expect(countAnomalies(byTorrent)).toEqual({ decrease: 1, reset: 0 });
  });
});
