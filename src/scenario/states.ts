import { FixtureStateName } from "../types";

export interface FixtureState {
  name: FixtureStateName;
  description: string;
}

export const FIXTURE_STATES: Record<FixtureStateName, FixtureState> = {
  pristine: {
    name: "pristine",
    description: "empty data home; no copy of letsencrypt-auto installed"
  },
  upgraded: {
    name: "upgraded",
    description: "the upgrade version has been installed into the data home"
  },
  "next-installed": {
    name: "next-installed",
    description: "the patch release after the upgrade version replaced the installed copy"
  }
};

/** The only state a scenario can start from without a preceding scenario. */
export const INITIAL_STATE: FixtureStateName = "pristine";
