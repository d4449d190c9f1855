/**
 * Session Snapshot
 *
 * Read-only view of everything the rendering layer displays.
 */

import type { SignalRole } from "../core/time";
import type {
  Window,
  NormalizedSegment,
  AnalyticRepresentation,
} from "../signal/signal";
import type { AlignmentSet } from "../alignment/alignment";
import type { ArrivalStatistics, DensityPoint } from "../arrival/arrival";
import type { ElasticModuliOutcome } from "../elastic/elastic";
import type { Diagnostic } from "../diagnostics/diagnostics";

export interface SignalSnapshot {
  role: SignalRole;
  window: Window;
  /** Last valid segment; null until one window selection succeeds */
  segment: NormalizedSegment | null;
  analytic: AnalyticRepresentation | null;
  picks: number[];
  statistics: ArrivalStatistics;
  /** Gaussian curve over the picks; empty while their std is 0 */
  pickDensity: DensityPoint[];
  moduli: ElasticModuliOutcome;
}

export interface SessionSnapshot {
  /** Number of commands applied so far */
  revision: number;
  template: SignalSnapshot;
  query: SignalSnapshot;
  /** Last valid alignment; null until both segments exist */
  alignment: AlignmentSet | null;
  /** Diagnostics emitted by the most recent command */
  diagnostics: Diagnostic[];
}
