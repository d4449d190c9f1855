import type { SignalRole } from "../core/time";
import type { ModulusName } from "../elastic/elastic";

/**
 * Diagnostic categories, one per recompute stage.
 */
export type DiagnosticCategory = "window" | "alignment" | "arrival" | "propagation";

/**
 * Diagnostic severity levels.
 */
export type DiagnosticSeverity = "info" | "warning" | "error";

/**
 * A report emitted when a recompute step fails but the session can keep
 * going on its last valid state.
 */
export interface Diagnostic {
  /** Unique identifier for deduplication */
  id: string;

  category: DiagnosticCategory;

  severity: DiagnosticSeverity;

  /** Human-readable message */
  message: string;

  /** Session revision (command count) at which it was emitted */
  revision: number;

  /** Optional: which signal the failure concerns */
  signal?: SignalRole;

  /** Optional: which propagated quantity the failure concerns */
  modulus?: ModulusName;
}

/**
 * A validation error returned when a command is rejected.
 */
export interface ValidationError {
  /** Which field or parameter failed */
  field: string;

  /** What went wrong */
  reason: string;

  /** Optional: what values are valid */
  hint?: string;
}

/**
 * Result of dispatching a command to the session.
 */
export interface CommandResult {
  /** Whether the command was accepted and applied */
  success: boolean;

  /** If rejected, why */
  errors?: ValidationError[];

  /** Diagnostics emitted while recomputing (even if successful) */
  diagnostics?: Diagnostic[];
}
