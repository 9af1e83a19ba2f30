export {
  parseChallenges,
  parseChallengesWithIssues,
  findChallenge,
  hasScheme,
  listSchemes,
} from './parser.js';
export { formatChallenges } from './format.js';
export type {
  Challenge,
  ChallengeHeaderInput,
  ChallengeParseIssue,
  ChallengeParseResult,
} from './types.js';
