export {
  createCoordinator,
  type Coordinator,
  type CoordinatorDeps,
  type DeployOutcome,
  type DeploymentReport,
  type TeardownReport,
} from "./coordinator.js";
