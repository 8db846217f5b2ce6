/**
 * Shared test types for transpiler suites.
 */

/**
 * TYPE DEFINITION: Test Scenario
 * Represents a single row of data in a table-driven test.
 *
 * @template T - The type of the expected result (defaults to unknown).
 */
export type TestScenario<T = unknown> = {
  /** A short, unique identifier for the scenario, shown in test logs. */
  id: string;

  /** What the scenario checks. */
  description: string;

  /** Source text fed to the function under test. */
  code: string;

  /** The expected output of the function under test. */
  expected: T;
};

/**
 * TYPE DEFINITION: Failure Scenario
 * A source text that must be rejected with a `ParseError`.
 */
export type FailureScenario = {
  id: string;
  description: string;
  code: string;
  /** Expected `ParseError.reason`. */
  reason: string;
  line: number;
  column: number;
};
