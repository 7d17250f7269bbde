export { extractGlossaryTerms } from './glossary.js';
export {
  DEFAULT_STATUTE_ALIASES,
  caseTitleFromName,
  compileStatuteAliases,
  extractCaseId,
  extractCaseRecord,
  extractJudgmentMetadata,
  findSectionReference,
  findStatuteMentions,
} from './judgments.js';
export type { CaseRecordOptions, CompiledStatuteAlias, JudgmentMetadata, StatuteAlias } from './judgments.js';
