export type { AlertDecision, AlertManagerOptions } from "./alert-manager";
export { AlertManager, formatAlertMessage } from "./alert-manager";
export type { MonitorOptions, MonitorOutcome } from "./orchestrator";
export { runMonitor } from "./orchestrator";
export type { LoopExitReason, TargetProbeLoopOptions, TargetRunResult } from "./probe-loop";
export { UNBOUNDED_ATTEMPTS, runTargetProbeLoop } from "./probe-loop";
export type { ShutdownCoordinatorOptions } from "./shutdown";
export { ShutdownCoordinator } from "./shutdown";
export type { StopSignalOptions, WaitOutcome } from "./stop-signal";
export { StopSignal } from "./stop-signal";
export type { SampleTotals, SummaryReport } from "./summary";
export { RunningSummary } from "./summary";
