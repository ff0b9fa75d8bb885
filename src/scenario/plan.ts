import { FixtureStateName, PlannedScenario, ScenarioDefinition } from "../types";
import { HarnessError } from "../util/errors";
import { findScenario, validateCatalog } from "./catalog";
import { INITIAL_STATE } from "./states";

/**
 * Orders the selected scenarios and inserts, ahead of any scenario whose
 * required state the chain is not already in, the scenarios that produce it.
 */
export function resolvePlan(catalog: ScenarioDefinition[], selected: string[] = []): PlannedScenario[] {
  validateCatalog(catalog);

  const names = selected.length > 0 ? selected : catalog.map((scenario) => scenario.name);
  const seenNames = new Set<string>();
  for (const name of names) {
    if (seenNames.has(name)) {
      throw new HarnessError(`scenario selected more than once: ${name}`);
    }
    seenNames.add(name);
  }

  const plan: PlannedScenario[] = [];
  let state: FixtureStateName | null = null;

  for (const name of names) {
    const scenario = findScenario(catalog, name);
    if (scenario.requires !== INITIAL_STATE && state !== scenario.requires) {
      for (const setupScenario of producersOf(catalog, scenario.requires, new Set())) {
        plan.push({ scenario: setupScenario, setup: true });
      }
    }
    plan.push({ scenario, setup: false });
    state = scenario.produces;
  }

  return plan;
}

function producersOf(
  catalog: ScenarioDefinition[],
  target: FixtureStateName,
  visiting: Set<FixtureStateName>
): ScenarioDefinition[] {
  if (visiting.has(target)) {
    throw new HarnessError(`fixture state '${target}' depends on itself`);
  }

  const producer = catalog.find((scenario) => scenario.produces === target && scenario.requires !== target);
  if (!producer) {
    throw new HarnessError(`no scenario produces fixture state '${target}'`);
  }

  if (producer.requires === INITIAL_STATE) {
    return [producer];
  }

  const nextVisiting = new Set(visiting);
  nextVisiting.add(target);
  return [...producersOf(catalog, producer.requires, nextVisiting), producer];
}
