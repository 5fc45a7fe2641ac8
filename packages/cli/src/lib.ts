export {
  CommandDispatcher,
  DEFAULT_EXECUTABLE,
  DEFAULT_SERVER_NAME,
  DEFAULT_TIMEOUT_MS,
  decodeJson,
  failure,
  normalizeOutcome,
  parseToolList,
  type DispatcherOptions
} from "./dispatcher.js";
export {
  createProcessRunner,
  launchProcess,
  spawnProcess,
  type LaunchedProcess,
  type Launcher,
  type ProcessOutcome,
  type ProcessRequest,
  type ProcessRunner
} from "./process.js";
export { SupabaseMcpClient, docsQuery, type EdgeFunctionFile, type ProjectListing } from "./client.js";
export { ConnectorCheck, defaultReportName, type Logger, type LogLevel } from "./check.js";
export { buildOverview, type OverviewReport } from "./overview.js";
export { checkProjectHealth, type HealthReport, type ProjectHealth } from "./health.js";
export { resolveRuntimeConfig, type RuntimeConfig, type RuntimeOverrides } from "./config.js";
