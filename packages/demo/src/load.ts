/**
 * @nestlock/demo — Scenario file loading.
 */

import { readFile, readdir } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import path from "node:path";
import { parseScenario } from "./scenario.js";
import type { Scenario } from "./scenario.js";

/** Directory holding the scenarios shipped with the package. */
export const BUNDLED_SCENARIO_DIR = fileURLToPath(new URL("../scenarios/", import.meta.url));

export async function loadScenarioFile(file: string): Promise<Scenario> {
  const text = await readFile(file, "utf8");
  return parseScenario(JSON.parse(text));
}

/**
 * Absolute paths of every `.json` file in `dir`, sorted by name.
 */
export async function listScenarioFiles(dir: string = BUNDLED_SCENARIO_DIR): Promise<string[]> {
  const names = await readdir(dir);
  return names
    .filter((name) => name.endsWith(".json"))
    .sort()
    .map((name) => path.join(dir, name));
}
