import type { FilterStage } from './types.js';

/**
 * Reject blunders against a side that was already clearly winning
 *
 * Disabled unless `filters.rejectNonInstructiveGain` is set.
 */
export const nonInstructiveGainStage: FilterStage = (candidate, context) => {
  const { filters, thresholds } = context.config;
  if (filters.rejectNonInstructiveGain && candidate.preBlunderScore >= thresholds.nonInstructiveGain) {
    return Promise.resolve({ accepted: false, reason: 'nonInstructiveGain' });
  }
  return Promise.resolve({ accepted: true, candidate });
};
