/**
 * Ranking Module
 */

export { createRankingConfig, type RankingConfig, rankingDefaults } from './config';
export { ContextReranker, describeEntity, keywordScore } from './reranker';
export type { EntityReranker, EntityScore, RankOptions } from './types';
