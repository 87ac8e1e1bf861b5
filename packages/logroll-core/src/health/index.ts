export {
  startHealthMonitor,
  type HealthCheck,
  type HealthMonitorHandle,
  type HealthMonitorOptions,
  type HealthResult,
} from "./monitor.js";
