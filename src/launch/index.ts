export {
  runLeg,
  launchBoth,
  failedPreflight,
  describeChecks,
  type LegOptions,
  type LaunchOptions,
  type LaunchLeg,
  type LaunchHandle,
} from "./executor.js";
