/**
 * Shared test data and scripted collaborators
 */

import type { DeployRequest } from "../types/deployment.js";
import type { CommandOptions, CommandResult, CommandRunner } from "../providers/command.js";
import { defaultScalingPolicy } from "../config/scaling.js";

export const makeRequest = (overrides: Partial<DeployRequest> = {}): DeployRequest => ({
  modelName: "org/test-model",
  gpu: "L4",
  gpuCount: 1,
  tpSize: 1,
  maxModelLen: 4096,
  concurrency: 32,
  coldStartMode: "no_fast_boot",
  scaleToZero: true,
  serverlessProvider: "modal",
  spotProvider: "skyserve",
  spotCloud: "aws",
  serviceName: "svc",
  scaling: defaultScalingPolicy(),
  serverlessOnly: false,
  serverVersion: "0.8.5",
  ...overrides,
});

export interface RecordedCommand {
  command: string;
  args: string[];
  options: CommandOptions;
}

export interface ScriptedRunner {
  run: CommandRunner;
  calls: RecordedCommand[];
}

export const ok = (stdout = ""): CommandResult => ({ exitCode: 0, stdout, stderr: "" });

export const fail = (stderr: string, exitCode = 1): CommandResult => ({
  exitCode,
  stdout: "",
  stderr,
});

/**
 * Runner that answers from a handler and records every call
 */
export const scriptedRunner = (
  handler: (args: string[], command: string) => CommandResult
): ScriptedRunner => {
  const calls: RecordedCommand[] = [];
  return {
    calls,
    run: async (command, args, options = {}) => {
      calls.push({ command, args: [...args], options });
      return handler([...args], command);
    },
  };
};
