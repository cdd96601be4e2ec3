export {
  planDeployment,
  buildServeCommand,
  resolveServerlessProvider,
  DEFAULT_SERVE_PORT,
  AUTO_PROVIDER,
  type DeploymentPlan,
  type PlanOptions,
} from "./planner.js";
