export {
  CASE_STYLES,
  splitWords,
  toCase,
  convertCase,
  matchesCase,
  describeCase,
} from './case.js';
export type { CaseStyle } from './case.js';
