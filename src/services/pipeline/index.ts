export { PipelineOrchestrator, type PipelineDependencies, type PipelineState } from './orchestrator.js';
