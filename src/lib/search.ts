export { splitLines } from './search/lines.js';
export {
  createLineMatcher,
  type LineMatcher,
  search,
  searchLines,
} from './search/matcher.js';
