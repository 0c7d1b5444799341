/**
 * Debug Module
 *
 * Observational side channel of the retrieval pipeline.
 */

export { computeMetrics, SearchDebugger } from './search-debugger';
export type {
  DebugStage,
  EntityDebugRecord,
  NodeExecution,
  NodeStatus,
  PipelineMetrics,
  SanitizedEntity,
  SearchDebugTrace,
  StageRecord,
  WorkflowTrace
} from './types';
export { DEBUG_STAGES } from './types';
export { sanitize, sanitizeEntities, WorkflowTracer, type WorkflowTracerOptions } from './workflow-tracer';
