export {
  WellnessIntentMatcher,
  loadWellnessIntents,
  type WellnessIntent,
  type WellnessIntentData,
  type WellnessIntentMatcherOptions,
  type WellnessReply,
  type WellnessReplyProvider,
  type RandomSource,
} from './wellness-intent-matcher.js';
