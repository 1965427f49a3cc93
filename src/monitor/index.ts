export { describeFailure, LOGIN_FAILED_NOTICE, runMonitorCycle } from "./monitorCycle";
export type { MonitorCycleDeps } from "./monitorCycle";
export { MonitorScheduler } from "./monitorScheduler";
export type { MonitorSchedulerOptions } from "./monitorScheduler";
