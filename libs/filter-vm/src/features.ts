/**
 * Process-wide feature flags consulted when a filter is initialized.
 */
export interface FilterFeatures {
  /**
   * Whether Math is reduced to its allow-list and Date.now removed.
   */
  isMathLimited(): boolean;
}

/**
 * Features fixed at construction time.
 */
export function createStaticFeatures(flags: { limitMathBuiltins: boolean }): FilterFeatures {
  const limitMath = flags.limitMathBuiltins;
  return {
    isMathLimited: () => limitMath,
  };
}
