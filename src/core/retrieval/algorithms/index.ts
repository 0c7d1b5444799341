/**
 * Retrieval Algorithms
 */

export { computeCosineSimilarity } from './similarity';
