export { VelocitySession, type VelocitySessionConfig } from "./VelocitySession";
export { SignalState, analyzeWindow, type SignalInput } from "./SignalState";
