export * from "./metadata";
export * from "./waveform";
