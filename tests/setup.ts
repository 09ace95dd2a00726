/**
 * @fileoverview Jest test setup and global utilities
 *
 * Provides custom matchers for tests.
 */

// ============================================================================
// CRITICAL: This export {} makes this file a module
// Without it, declare global won't work properly
// ============================================================================
export {};

type ErrorClass = abstract new (...args: never[]) => Error;

// ============================================================================
// Global Type Declarations
// ============================================================================

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace jest {
    interface Matchers<R> {
      /**
       * Check if error is of specific type
       * @param expected Error constructor
       */
      toThrowErrorType(expected: ErrorClass): R;

      /**
       * Check if array contains item matching predicate
       * @param predicate Function to test each item
       */
      toContainItemMatching<T>(predicate: (item: T) => boolean): R;
    }
  }
}

// ============================================================================
// Custom Jest Matchers
// ============================================================================

expect.extend({
  /**
   * Check if thrown error is of specific type
   */
  toThrowErrorType(received: () => void, expected: ErrorClass) {
    try {
      received();
      return {
        pass: false,
        message: () => `Expected function to throw ${expected.name}, but it didn't throw`,
      };
    } catch (error) {
      const pass = error instanceof expected;
      return {
        pass,
        message: () =>
          pass
            ? `Expected function not to throw ${expected.name}`
            : `Expected function to throw ${expected.name}, but it threw ${
                error instanceof Error ? error.constructor.name : typeof error
              }`,
      };
    }
  },

  /**
   * Check if array contains item matching predicate
   */
  toContainItemMatching(received: unknown[], predicate: (item: unknown) => boolean) {
    const pass = received.some(predicate);
    return {
      pass,
      message: () =>
        pass
          ? 'Expected array not to contain matching item'
          : 'Expected array to contain matching item',
    };
  },
});
