export * from "./core/time";
export * from "./core/uncertainty";

// Waveform data (series, window, segment, analytic representation)
export * from "./signal/signal";

export * from "./alignment/alignment";

export * from "./arrival/arrival";

// Material inputs and propagated moduli
export * from "./elastic/elastic";

export * from "./control/commands";

export * from "./diagnostics/diagnostics";

export * from "./session/snapshot";
