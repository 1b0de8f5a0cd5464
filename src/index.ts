export type {
  Catalog,
  MatchExplanation,
  Polarity,
  SelectOptions,
  SituationContext,
  SuggestionItem,
  SuggestionResult
} from './types';
export { select, explainMatch, compareSuggestions } from './engine/select';
export { getCatalog, parseCatalog, loadCatalogFile, catalogTags } from './catalog';
export * from './situation';
export { reduceContext, type ContextEvent } from './state/contextEvents';
export { SessionManager, type SessionState } from './state/sessionManager';
export { paragraphs, formatResult, formatMoodProfile } from './present/format';
export { CatalogError, ConfigError, DuplicateSessionError, SessionNotFoundError } from './errors';
export { CFG, loadConfig, type Config } from './config';
