/**
 * Step Definitions for Comparator Ordering Feature
 *
 * Pure function tests: no fixtures beyond in-memory number lists.
 */
import { fileURLToPath } from "node:url";
import { loadFeature, describeFeature } from "@amiceli/vitest-cucumber";
import { expect } from "vitest";
import { comparingIndexed, compare, isIn, isInExclusive } from "../../src/index.js";

// ============================================================================
// Test State
// ============================================================================

interface ScenarioState {
  numbers: Array<number | null>;
  reference: number[];
  sorted: Array<number | null>;
  bounds: [number, number];
}

function initState(): ScenarioState {
  return {
    numbers: [],
    reference: [],
    sorted: [],
    bounds: [0, 0],
  };
}

let state: ScenarioState = initState();

function parseList(text: string): Array<number | null> {
  return text
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((s) => (s === "null" ? null : Number(s)));
}

function presentNumbers(text: string): number[] {
  return parseList(text).filter((n): n is number => n !== null);
}

// ============================================================================
// Feature Tests
// ============================================================================

const feature = await loadFeature(
  fileURLToPath(new URL("../features/behavior/comparator-ordering.feature", import.meta.url))
);

describeFeature(feature, ({ Scenario, ScenarioOutline, BeforeEachScenario }) => {
  BeforeEachScenario(() => {
    state = initState();
  });

  Scenario("Absent values sort first by default", ({ Given, When, Then }) => {
    Given("the numbers {string}", (_ctx: unknown, numbers: string) => {
      state.numbers = parseList(numbers);
    });

    When("they are sorted with the null-safe comparator", () => {
      state.sorted = [...state.numbers].sort((a, b) => compare(a, b));
    });

    Then("the order should be {string}", (_ctx: unknown, expected: string) => {
      expect(state.sorted).toEqual(parseList(expected));
    });
  });

  Scenario("Absent values sort last when null is greater", ({ Given, When, Then }) => {
    Given("the numbers {string}", (_ctx: unknown, numbers: string) => {
      state.numbers = parseList(numbers);
    });

    When("they are sorted with the null-safe comparator ranking null greater", () => {
      state.sorted = [...state.numbers].sort((a, b) => compare(a, b, true));
    });

    Then("the order should be {string}", (_ctx: unknown, expected: string) => {
      expect(state.sorted).toEqual(parseList(expected));
    });
  });

  ScenarioOutline(
    "Reference order places missing keys by flag",
    ({ Given, And, When, Then }, variables: Record<string, string>) => {
      Given("the reference order {string}", (_ctx: unknown, reference: string) => {
        state.reference = presentNumbers(reference);
      });

      And('the numbers "<input>"', () => {
        state.numbers = parseList(variables.input);
      });

      When("they are sorted by reference position with atEndIfMiss <atEnd>", () => {
        const byReference = comparingIndexed(
          (n: number) => n,
          variables.atEnd === "true",
          state.reference
        );
        state.sorted = presentNumbers(variables.input).sort(byReference);
      });

      Then('the order should be "<expected>"', () => {
        expect(state.sorted).toEqual(parseList(variables.expected));
      });
    }
  );

  Scenario("Range checks ignore bound order", ({ Given, Then, And }) => {
    Given("the bounds {string} and {string}", (_ctx: unknown, first: string, second: string) => {
      state.bounds = [Number(first), Number(second)];
    });

    Then("{string} should be within the bounds exclusively", (_ctx: unknown, value: string) => {
      const [c1, c2] = state.bounds;
      expect(isInExclusive(Number(value), c1, c2)).toBe(true);
      expect(isIn(Number(value), c1, c2)).toBe(true);
    });

    And("{string} should be within the bounds inclusively only", (_ctx: unknown, value: string) => {
      const [c1, c2] = state.bounds;
      expect(isIn(Number(value), c1, c2)).toBe(true);
      expect(isInExclusive(Number(value), c1, c2)).toBe(false);
    });

    And("{string} should be outside the bounds", (_ctx: unknown, value: string) => {
      const [c1, c2] = state.bounds;
      expect(isIn(Number(value), c1, c2)).toBe(false);
    });
  });
});
