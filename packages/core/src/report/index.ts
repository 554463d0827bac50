export {
  formatDebate,
  formatDebateJson,
  formatDebateList,
  formatDebateMarkdown,
  formatDebateText,
  formatMs,
  formatTimestamp,
} from './format.js';
export type { DebateFormat } from './format.js';
