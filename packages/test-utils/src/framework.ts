/**
 * The subset of a test runner's API the generators rely on
 */
export interface TestFramework {
  describe: (name: string, fn: () => void) => void;
  it: (name: string, fn: () => void | Promise<void>) => void;
  expect: (actual: unknown) => {
    toBe: (expected: unknown) => void;
    toEqual: (expected: unknown) => void;
    toThrow: (error?: string | RegExp) => void;
  };
}
