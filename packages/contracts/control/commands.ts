import type { SignalRole, Us } from "../core/time";

/**
 * Commands the UI layer sends into the session.
 *
 * The set is closed: the session exposes no callbacks, and the UI decides
 * when each command is sent. Every command triggers exactly the recompute
 * steps downstream of what it changes.
 */
export type SessionCommand =
  /** Move the window bound nearest to `time`; resegment and realign. */
  | { op: "adjustWindow"; signal: SignalRole; time: Us }
  /** Append an arrival pick; repropagate that signal. */
  | { op: "addPick"; signal: SignalRole; value: Us }
  /**
   * Pick the raw warping-path point nearest to a click on the
   * query-time × template-time plane; appends to both pick sets.
   */
  | { op: "pickAlignedPair"; queryTime: Us; templateTime: Us }
  /** Rerun every stage from the current windows and picks. */
  | { op: "recompute" };
