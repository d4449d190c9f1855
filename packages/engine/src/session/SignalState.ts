import type {
  ElasticModuliOutcome,
  MaterialProperties,
  SignalRole,
  TimeSeries,
  UncertainScalar,
  Window,
} from "@velopick/contracts";
import { computeAnalyticRepresentation } from "../analytic/AnalyticSignal";
import type { SegmentAnalysis } from "../alignment/alignSegments";
import { ArrivalEstimator } from "../arrival/ArrivalEstimator";
import {
  propagateElasticModuli,
  transitTimeFromStatistics,
  type PropagationConfig,
} from "../uncertainty/ElasticPropagator";
import { adjustBound, createDefaultWindow, extractNormalized } from "../windowing/Windowing";

/**
 * What the loading layer provides for one recording.
 */
export interface SignalInput {
  series: TimeSeries;
  properties: MaterialProperties;
  /** Initial window; defaults to the two samples around the midpoint */
  window?: Window;
}

/**
 * Normalize the windowed samples and derive their analytic representation.
 *
 * @throws DegenerateWindowError if the window selects nothing usable
 */
export function analyzeWindow(series: TimeSeries, window: Window): SegmentAnalysis {
  const segment = extractNormalized(series, window);
  return { segment, analytic: computeAnalyticRepresentation(segment) };
}

/**
 * Per-signal session state: the immutable recording and material inputs,
 * the operator-owned window and picks, and the last valid results computed
 * from them.
 */
export class SignalState {
  readonly role: SignalRole;
  readonly series: TimeSeries;
  readonly properties: MaterialProperties;
  readonly arrivals = new ArrivalEstimator();

  private currentWindow: Window;
  private lastAnalysis: SegmentAnalysis | null = null;
  private lastModuli: ElasticModuliOutcome | null = null;

  constructor(role: SignalRole, input: SignalInput) {
    this.role = role;
    this.series = input.series;
    this.properties = input.properties;
    this.currentWindow = input.window
      ? { ...input.window }
      : createDefaultWindow(input.series);
  }

  get window(): Window {
    return { ...this.currentWindow };
  }

  get analysis(): SegmentAnalysis | null {
    return this.lastAnalysis;
  }

  get moduli(): ElasticModuliOutcome | null {
    return this.lastModuli;
  }

  adjustWindow(time: number): void {
    this.currentWindow = adjustBound(this.currentWindow, time);
  }

  /**
   * Recompute the segment for the current window. On failure the previous
   * segment is kept and the error is rethrown.
   */
  resegment(): SegmentAnalysis {
    const analysis = analyzeWindow(this.series, this.currentWindow);
    this.lastAnalysis = analysis;
    return analysis;
  }

  repropagate(length: UncertainScalar, config: PropagationConfig): ElasticModuliOutcome {
    const moduli = propagateElasticModuli(
      {
        length,
        density: this.properties.density,
        shear: this.properties.shear,
        transitTime: transitTimeFromStatistics(this.arrivals.statistics()),
      },
      config
    );
    this.lastModuli = moduli;
    return moduli;
  }
}
