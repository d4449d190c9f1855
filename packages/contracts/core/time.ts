export type Us = number;      // microseconds (waveform time axis, arrival picks)
export type Seconds = number; // raw recorder time axis

/**
 * Which of the two paired recordings a value belongs to.
 * The template is the dry recording, the query the saturated one.
 */
export type SignalRole = "template" | "query";

export const SIGNAL_ROLES: readonly SignalRole[] = ["template", "query"];
