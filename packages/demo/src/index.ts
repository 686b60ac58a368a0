/**
 * @nestlock/demo — Scenario harness for the lock manager.
 *
 * Loads JSON scenario files, replays them against a LockManager and
 * renders a terminal report. The CLI lives in main.ts.
 */

export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";

export { parseScenario, ScenarioSchema, StepSchema } from "./scenario.js";
export type { Scenario, Step } from "./scenario.js";

export { runScenario, ScriptedParticipant } from "./runner.js";
export type {
  ScenarioReport,
  SessionOutcome,
  BalanceLine,
  RunScenarioOptions,
} from "./runner.js";

export { renderReport } from "./report.js";

export { loadScenarioFile, listScenarioFiles, BUNDLED_SCENARIO_DIR } from "./load.js";

export { ScenarioError, errorCode, errorMessage } from "./errors.js";
export type { ScenarioErrorCode } from "./errors.js";
