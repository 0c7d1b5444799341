/**
 * Query Scope Module
 */

export { SCOPE_CONFIGS } from './config';
export { calculateOptimalK, QueryScopeDetector, toWireScopeDecision } from './detector';
export {
  PROMPT_FORMATS,
  type PromptFormat,
  QUERY_SCOPES,
  type QueryScope,
  type ScopeConfig,
  type ScopeDetection,
  type WireScopeDecision
} from './types';
