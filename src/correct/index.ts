export {
  correctSentence,
  findClosestSentence,
  isBypassed,
  matchTranscript,
  resolveTranscript,
  type ClosestSentence,
  type CorrectionDeps,
  type CorrectionOutcome,
} from "./corrector.js";
