/**
 * Velocity Session
 *
 * Holds the template (dry) and query (saturated) signal state and routes
 * UI commands to the recompute stages they invalidate:
 *
 *   adjustWindow    → Windowing → Analytic Representation → Alignment
 *   addPick         → Arrival Estimator → Uncertainty Propagator
 *   pickAlignedPair → (both signals) Arrival Estimator → Uncertainty Propagator
 *   recompute       → every stage
 *
 * Recompute failures never escape dispatch(): the last valid results stay in
 * place and the failure is returned as a Diagnostic.
 */

import type {
  AlignmentPath,
  AlignmentSet,
  AnalyticRepresentation,
  CommandResult,
  Diagnostic,
  ElasticModuliOutcome,
  ModulusOutcome,
  NormalizedSegment,
  SessionCommand,
  SessionSnapshot,
  SignalRole,
  SignalSnapshot,
  UncertainScalar,
  ValidationError,
} from "@velopick/contracts";
import { MODULUS_NAMES, SIGNAL_ROLES } from "@velopick/contracts";
import {
  alignSegments,
  alignmentTimePairs,
  nearestAlignedPair,
} from "../alignment/alignSegments";
import { arrivalDensityCurve } from "../arrival/ArrivalEstimator";
import { DegenerateWindowError } from "../errors";
import type { PropagationConfig } from "../uncertainty/ElasticPropagator";
import { SignalState, type SignalInput } from "./SignalState";

/**
 * Configuration for a velocity session.
 */
export interface VelocitySessionConfig {
  /** Dry recording and its material properties */
  template: SignalInput;

  /** Saturated recording and its material properties */
  query: SignalInput;

  /** Sample length, shared by both states (cm) */
  length: UncertainScalar;

  propagation?: PropagationConfig;

  /** Points on the pick density curve. @default 50 */
  densityCurvePoints?: number;
}

export class VelocitySession {
  private readonly signals: Record<SignalRole, SignalState>;
  private readonly length: UncertainScalar;
  private readonly propagation: PropagationConfig;
  private readonly densityCurvePoints: number;

  private alignment: AlignmentSet | null = null;
  private revision = 0;
  private lastDiagnostics: Diagnostic[] = [];

  constructor(config: VelocitySessionConfig) {
    this.signals = {
      template: new SignalState("template", config.template),
      query: new SignalState("query", config.query),
    };
    this.length = config.length;
    this.propagation = config.propagation ?? {};
    this.densityCurvePoints = config.densityCurvePoints ?? 50;

    this.lastDiagnostics = this.recomputeAll();
  }

  // === Commands ===

  dispatch(command: SessionCommand): CommandResult {
    const errors = this.validate(command);
    if (errors.length > 0) {
      return { success: false, errors };
    }

    this.revision++;
    let diagnostics: Diagnostic[] = [];

    switch (command.op) {
      case "adjustWindow": {
        this.signals[command.signal].adjustWindow(command.time);
        diagnostics = this.resegment(command.signal);
        if (diagnostics.length === 0) {
          diagnostics = this.realign();
        }
        break;
      }
      case "addPick": {
        this.signals[command.signal].arrivals.addPick(command.value);
        diagnostics = this.repropagate(command.signal);
        break;
      }
      case "pickAlignedPair": {
        diagnostics = this.pickAlignedPair(command.queryTime, command.templateTime);
        break;
      }
      case "recompute": {
        diagnostics = this.recomputeAll();
        break;
      }
    }

    this.lastDiagnostics = diagnostics;
    return { success: true, diagnostics };
  }

  private validate(command: SessionCommand): ValidationError[] {
    const errors: ValidationError[] = [];
    switch (command.op) {
      case "adjustWindow":
        errors.push(...validateSignal(command.signal));
        if (!Number.isFinite(command.time)) {
          errors.push({ field: "time", reason: "must be a finite number", hint: "µs" });
        }
        break;
      case "addPick":
        errors.push(...validateSignal(command.signal));
        if (!Number.isFinite(command.value)) {
          errors.push({ field: "value", reason: "must be a finite number", hint: "µs" });
        }
        break;
      case "pickAlignedPair":
        if (!Number.isFinite(command.queryTime)) {
          errors.push({ field: "queryTime", reason: "must be a finite number", hint: "µs" });
        }
        if (!Number.isFinite(command.templateTime)) {
          errors.push({ field: "templateTime", reason: "must be a finite number", hint: "µs" });
        }
        if (!this.alignment) {
          errors.push({
            field: "op",
            reason: "no alignment has been computed yet",
            hint: "select a valid window on both signals first",
          });
        }
        break;
      case "recompute":
        break;
    }
    return errors;
  }

  // === Recompute stages ===

  private recomputeAll(): Diagnostic[] {
    const diagnostics = SIGNAL_ROLES.flatMap((role) => this.resegment(role));
    diagnostics.push(...this.realign());
    for (const role of SIGNAL_ROLES) {
      diagnostics.push(...this.repropagate(role));
    }
    return diagnostics;
  }

  private resegment(role: SignalRole): Diagnostic[] {
    const state = this.signals[role];
    try {
      state.resegment();
      return [];
    } catch (error) {
      if (!(error instanceof DegenerateWindowError)) throw error;
      console.warn(`[VelocitySession] ${role} window rejected: ${error.message}`);
      return [
        {
          id: `window-${role}-${this.revision}`,
          category: "window",
          severity: "error",
          message: `${error.message}; keeping the previous segment`,
          revision: this.revision,
          signal: role,
        },
      ];
    }
  }

  private realign(): Diagnostic[] {
    const query = this.signals.query.analysis;
    const template = this.signals.template.analysis;
    if (!query || !template) {
      return [
        {
          id: `alignment-pending-${this.revision}`,
          category: "alignment",
          severity: "info",
          message: "Alignment needs a valid segment on both signals",
          revision: this.revision,
        },
      ];
    }
    this.alignment = alignSegments(query, template);
    return [];
  }

  private repropagate(role: SignalRole): Diagnostic[] {
    const moduli = this.signals[role].repropagate(this.length, this.propagation);
    const diagnostics: Diagnostic[] = [];

    for (const name of MODULUS_NAMES) {
      const outcome = moduli[name];
      if (outcome.status === "failed") {
        console.warn(`[VelocitySession] ${role} ${outcome.error.message}`);
        diagnostics.push({
          id: `propagation-${role}-${name}-${this.revision}`,
          category: "propagation",
          severity: "warning",
          message: outcome.error.message,
          revision: this.revision,
          signal: role,
          modulus: name,
        });
      } else if (outcome.status === "ok" && outcome.distribution.nonFiniteFraction > 0) {
        const percent = (outcome.distribution.nonFiniteFraction * 100).toFixed(1);
        diagnostics.push({
          id: `propagation-quality-${role}-${name}-${this.revision}`,
          category: "propagation",
          severity: "info",
          message: `${percent}% of ${name} samples are non-finite`,
          revision: this.revision,
          signal: role,
          modulus: name,
        });
      }
    }

    return diagnostics;
  }

  private pickAlignedPair(queryTime: number, templateTime: number): Diagnostic[] {
    const query = this.signals.query.analysis;
    const template = this.signals.template.analysis;
    if (!this.alignment || !query || !template) {
      return [];
    }

    const pairs = alignmentTimePairs(this.alignment.raw, query.segment, template.segment);
    const nearest = nearestAlignedPair(pairs, queryTime, templateTime);
    if (!nearest) {
      return [];
    }

    this.signals.template.arrivals.addPick(nearest.templateTime);
    this.signals.query.arrivals.addPick(nearest.queryTime);
    return [...this.repropagate("template"), ...this.repropagate("query")];
  }

  // === Queries ===

  snapshot(): SessionSnapshot {
    return {
      revision: this.revision,
      template: this.signalSnapshot("template"),
      query: this.signalSnapshot("query"),
      alignment: this.alignment ? copyAlignmentSet(this.alignment) : null,
      diagnostics: [...this.lastDiagnostics],
    };
  }

  private signalSnapshot(role: SignalRole): SignalSnapshot {
    const state = this.signals[role];
    const statistics = state.arrivals.statistics();
    const moduli = state.moduli;
    if (!moduli) {
      throw new Error(`Signal ${role} has not been propagated`);
    }
    return {
      role,
      window: state.window,
      segment: state.analysis ? copySegment(state.analysis.segment) : null,
      analytic: state.analysis ? copyAnalytic(state.analysis.analytic) : null,
      picks: [...state.arrivals.picks],
      statistics,
      pickDensity: arrivalDensityCurve(statistics, this.densityCurvePoints),
      moduli: copyModuli(moduli),
    };
  }
}

function validateSignal(signal: SignalRole): ValidationError[] {
  if (SIGNAL_ROLES.includes(signal)) return [];
  return [
    { field: "signal", reason: `unknown signal "${signal}"`, hint: SIGNAL_ROLES.join(" | ") },
  ];
}

// Snapshots hand out copies; the session keeps the only live state.

function copySegment(segment: NormalizedSegment): NormalizedSegment {
  return { times: [...segment.times], amplitudes: [...segment.amplitudes], scale: segment.scale };
}

function copyAnalytic(analytic: AnalyticRepresentation): AnalyticRepresentation {
  return { envelope: [...analytic.envelope], phase: [...analytic.phase] };
}

function copyPath(path: AlignmentPath): AlignmentPath {
  return {
    referenceIndices: [...path.referenceIndices],
    targetIndices: [...path.targetIndices],
    cost: path.cost,
  };
}

function copyAlignmentSet(set: AlignmentSet): AlignmentSet {
  return { raw: copyPath(set.raw), envelope: copyPath(set.envelope), phase: copyPath(set.phase) };
}

function copyOutcome(outcome: ModulusOutcome): ModulusOutcome {
  if (outcome.status !== "ok") return { ...outcome };
  return {
    status: "ok",
    distribution: { ...outcome.distribution, samples: [...outcome.distribution.samples] },
  };
}

function copyModuli(moduli: ElasticModuliOutcome): ElasticModuliOutcome {
  return {
    velocity: copyOutcome(moduli.velocity),
    bulkModulus: copyOutcome(moduli.bulkModulus),
    youngModulus: copyOutcome(moduli.youngModulus),
    poissonsRatio: copyOutcome(moduli.poissonsRatio),
  };
}
