export { type ClusterPhaseResult, searchClusterCandidates } from './clusters';
export { recallMemoryCandidates } from './memory';
export { vectorFallback } from './vector';
