import { afterEach, beforeEach, describe, it, expect, vi, type MockInstance } from "vitest";
import {
  createTimeSeries,
  deterministic,
  gaussian,
  type SessionCommand,
  type UncertainScalar,
  type Window,
} from "@velopick/contracts";
import { VelocitySession } from "../../src/session/VelocitySession";

const TIMES = Array.from({ length: 20 }, (_, j) => j);

function createSession(
  queryWindow?: Window,
  length: UncertainScalar = deterministic(0.3)
): VelocitySession {
  return new VelocitySession({
    template: {
      series: createTimeSeries(TIMES, TIMES.map((j) => Math.sin(0.7 * j))),
      properties: { density: deterministic(2.5), shear: gaussian(10, 0.5) },
    },
    query: {
      series: createTimeSeries(TIMES, TIMES.map((j) => Math.sin(0.7 * (j - 2)))),
      properties: { density: deterministic(2.6), shear: gaussian(11, 0.5) },
      window: queryWindow,
    },
    length,
    propagation: { sampleCount: 500, rngSeed: 7 },
  });
}

describe("VelocitySession", () => {
  let warn: MockInstance<typeof console.warn>;

  beforeEach(() => {
    warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    warn.mockRestore();
  });

  describe("initial state", () => {
    it("computes every stage on construction", () => {
      const snapshot = createSession().snapshot();

      expect(snapshot.revision).toBe(0);
      expect(snapshot.template.window).toEqual({ start: 10, finish: 11 });
      expect(snapshot.query.window).toEqual({ start: 10, finish: 11 });
      expect(snapshot.template.segment?.times).toEqual([10, 11]);
      expect(snapshot.alignment?.raw.referenceIndices[0]).toBe(1);
      expect(snapshot.template.statistics).toEqual({
        min: -1,
        max: 1,
        mean: 0,
        std: 0.25,
        count: 0,
      });
      expect(snapshot.template.moduli.velocity.status).toBe("ok");
      expect(snapshot.diagnostics).toEqual([]);
    });

    it("reports a degenerate initial window and waits for alignment", () => {
      const snapshot = createSession({ start: 100, finish: 200 }).snapshot();

      expect(snapshot.query.segment).toBeNull();
      expect(snapshot.query.analytic).toBeNull();
      expect(snapshot.alignment).toBeNull();
      expect(snapshot.diagnostics.map((d) => d.id)).toEqual([
        "window-query-0",
        "alignment-pending-0",
      ]);
      expect(warn).toHaveBeenCalledTimes(1);
    });
  });

  describe("adjustWindow", () => {
    it("moves the nearer bound and resegments", () => {
      const session = createSession();
      const result = session.dispatch({ op: "adjustWindow", signal: "template", time: 2 });
      const snapshot = session.snapshot();

      expect(result).toEqual({ success: true, diagnostics: [] });
      expect(snapshot.revision).toBe(1);
      expect(snapshot.template.window).toEqual({ start: 2, finish: 11 });
      expect(snapshot.template.segment?.times).toEqual([2, 3, 4, 5, 6, 7, 8, 9, 10, 11]);
      expect(snapshot.query.window).toEqual({ start: 10, finish: 11 });
    });

    it("realigns against the new segment", () => {
      const session = createSession();
      session.dispatch({ op: "adjustWindow", signal: "template", time: 2 });
      const raw = session.snapshot().alignment?.raw;

      expect(raw?.referenceIndices.at(-1)).toBe(2);
      expect(raw?.targetIndices.at(-1)).toBe(10);
    });

    it("keeps the last valid segment and alignment on a degenerate window", () => {
      const session = createSession();
      session.dispatch({ op: "adjustWindow", signal: "query", time: 10.5 });
      const before = session.snapshot();
      const result = session.dispatch({ op: "adjustWindow", signal: "query", time: 10.2 });
      const after = session.snapshot();

      expect(before.query.window).toEqual({ start: 10, finish: 10.5 });
      expect(after.query.window).toEqual({ start: 10.2, finish: 10.5 });
      expect(after.query.segment).toEqual(before.query.segment);
      expect(after.query.segment?.times).toEqual([10]);
      expect(after.alignment).toEqual(before.alignment);

      expect(result.success).toBe(true);
      expect(result.diagnostics).toEqual([
        {
          id: "window-query-2",
          category: "window",
          severity: "error",
          message: "Window [10.2, 10.5] selects no samples; keeping the previous segment",
          revision: 2,
          signal: "query",
        },
      ]);
      expect(warn).toHaveBeenCalledWith(
        "[VelocitySession] query window rejected: Window [10.2, 10.5] selects no samples"
      );
    });

    it("rejects a non-finite time without changing the revision", () => {
      const session = createSession();
      const result = session.dispatch({ op: "adjustWindow", signal: "query", time: Infinity });

      expect(result).toEqual({
        success: false,
        errors: [{ field: "time", reason: "must be a finite number", hint: "µs" }],
      });
      expect(session.snapshot().revision).toBe(0);
    });
  });

  describe("addPick", () => {
    it("updates statistics and the density curve of one signal", () => {
      const session = createSession();
      session.dispatch({ op: "addPick", signal: "template", value: 3 });
      session.dispatch({ op: "addPick", signal: "template", value: 5 });
      const snapshot = session.snapshot();

      expect(snapshot.template.picks).toEqual([3, 5]);
      expect(snapshot.template.statistics).toEqual({ min: 3, max: 5, mean: 4, std: 1, count: 2 });
      expect(snapshot.template.pickDensity).toHaveLength(50);
      expect(snapshot.template.pickDensity[0].time).toBe(1);
      expect(snapshot.query.picks).toEqual([]);
    });

    it("propagates the picks into velocity", () => {
      const session = createSession();
      session.dispatch({ op: "addPick", signal: "template", value: 2 });
      const velocity = session.snapshot().template.moduli.velocity;

      expect(velocity.status).toBe("ok");
      if (velocity.status === "ok") {
        expect(velocity.distribution.samples).toHaveLength(1);
        expect(velocity.distribution.mean).toBeCloseTo(1500, 9);
      }
    });

    it("rejects a NaN pick", () => {
      const session = createSession();
      const result = session.dispatch({ op: "addPick", signal: "query", value: NaN });

      expect(result.success).toBe(false);
      expect(result.errors?.[0].field).toBe("value");
      expect(session.snapshot().query.picks).toEqual([]);
      expect(session.snapshot().revision).toBe(0);
    });

    it("reports a failed velocity as a warning and skips its dependents", () => {
      const session = createSession();
      const result = session.dispatch({ op: "addPick", signal: "template", value: 0 });
      const moduli = session.snapshot().template.moduli;

      expect(result.diagnostics).toEqual([
        {
          id: "propagation-template-velocity-1",
          category: "propagation",
          severity: "warning",
          message: "All 1 samples of velocity are non-finite",
          revision: 1,
          signal: "template",
          modulus: "velocity",
        },
      ]);
      expect(moduli.bulkModulus).toEqual({ status: "skipped", blockedBy: "velocity" });
      expect(warn).toHaveBeenCalledWith(
        "[VelocitySession] template All 1 samples of velocity are non-finite"
      );
    });
  });

  describe("signal validation", () => {
    it("rejects an unknown signal role", () => {
      const session = createSession();
      // commands may arrive from untyped callers
      const command: SessionCommand = JSON.parse(
        '{"op":"addPick","signal":"reference","value":3}'
      );
      const result = session.dispatch(command);

      expect(result).toEqual({
        success: false,
        errors: [
          { field: "signal", reason: 'unknown signal "reference"', hint: "template | query" },
        ],
      });
      expect(session.snapshot().revision).toBe(0);
    });
  });

  describe("data quality", () => {
    it("reports partly non-finite moduli as info and keeps their finite statistics", () => {
      // v² overflows for transit times below about 0.75 µs
      const session = createSession(undefined, deterministic(1e150));
      session.dispatch({ op: "addPick", signal: "template", value: 1 });
      const result = session.dispatch({ op: "addPick", signal: "template", value: 3 });
      const bulk = session.snapshot().template.moduli.bulkModulus;

      expect(result.success).toBe(true);
      expect(result.diagnostics?.map((d) => [d.id, d.severity])).toEqual([
        ["propagation-quality-template-bulkModulus-2", "info"],
        ["propagation-quality-template-youngModulus-2", "info"],
        ["propagation-quality-template-poissonsRatio-2", "info"],
      ]);
      expect(bulk.status).toBe("ok");
      if (bulk.status === "ok") {
        expect(bulk.distribution.nonFiniteFraction).toBeGreaterThan(0);
        expect(bulk.distribution.nonFiniteFraction).toBeLessThan(1);
        expect(Number.isFinite(bulk.distribution.mean)).toBe(true);
      }
    });
  });

  describe("snapshot", () => {
    it("hands out copies that cannot change the session", () => {
      const session = createSession();
      const snapshot = session.snapshot();
      const segment = snapshot.query.segment;
      const alignment = snapshot.alignment;
      const velocity = snapshot.template.moduli.velocity;
      if (!segment || !alignment || velocity.status !== "ok") {
        throw new Error("expected a computed session");
      }
      const amplitude = segment.amplitudes[0];
      const sample = velocity.distribution.samples[0];

      segment.amplitudes[0] = 42;
      alignment.raw.referenceIndices[0] = 99;
      velocity.distribution.samples[0] = -1;

      const fresh = session.snapshot();
      const freshVelocity = fresh.template.moduli.velocity;
      expect(fresh.query.segment?.amplitudes[0]).toBe(amplitude);
      expect(fresh.alignment?.raw.referenceIndices[0]).toBe(1);
      expect(freshVelocity.status === "ok" && freshVelocity.distribution.samples[0]).toBe(sample);
    });

    it("picks from the session's own path after a snapshot is edited", () => {
      const session = createSession();
      const alignment = session.snapshot().alignment;
      if (!alignment) throw new Error("expected an alignment");
      alignment.raw.referenceIndices[0] = 99;

      session.dispatch({ op: "pickAlignedPair", queryTime: 10.1, templateTime: 9.9 });

      expect(session.snapshot().query.picks).toEqual([10]);
    });
  });

  describe("pickAlignedPair", () => {
    it("appends the nearest raw-path times to both signals", () => {
      const session = createSession();
      const result = session.dispatch({ op: "pickAlignedPair", queryTime: 10.1, templateTime: 9.9 });
      const snapshot = session.snapshot();

      expect(result.success).toBe(true);
      expect(snapshot.query.picks).toEqual([10]);
      expect(snapshot.template.picks).toEqual([10]);
    });

    it("is rejected before any alignment exists", () => {
      const session = createSession({ start: 100, finish: 200 });
      const result = session.dispatch({ op: "pickAlignedPair", queryTime: 10, templateTime: 10 });

      expect(result.success).toBe(false);
      expect(result.errors?.map((e) => e.field)).toEqual(["op"]);
      expect(session.snapshot().revision).toBe(0);
    });
  });

  describe("recompute", () => {
    it("reruns every stage and bumps the revision", () => {
      const session = createSession();
      session.dispatch({ op: "addPick", signal: "query", value: 4 });
      const result = session.dispatch({ op: "recompute" });
      const snapshot = session.snapshot();

      expect(result).toEqual({ success: true, diagnostics: [] });
      expect(snapshot.revision).toBe(2);
      expect(snapshot.query.picks).toEqual([4]);
      expect(snapshot.diagnostics).toEqual([]);
    });
  });
});
