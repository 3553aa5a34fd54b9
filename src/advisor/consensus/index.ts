export {
  buildRecommendation,
  unanalyzedRecommendation,
  tallyVerdicts,
  combineConfidence,
  SUPPORTING_VERDICTS,
  OPPOSING_VERDICTS,
  QUORUM
} from './engine';
export type { VerdictTally } from './engine';
