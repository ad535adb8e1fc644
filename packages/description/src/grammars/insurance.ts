import type { Grammar } from '../types.js';

/** Insurance premiums and refunds in a layout the bank no longer uses. */
export const legacyInsuranceGrammar: Grammar = {
  name: 'legacy_insurance',
  decode(input, normalize) {
    return {
      type: 'legacy_insurance',
      fields: [['text', normalize(`${input.head} ${input.tail}`)]],
    };
  },
};
