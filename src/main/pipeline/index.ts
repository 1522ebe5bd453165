/**
 * Pipeline Module
 *
 * After capture stops, the pipeline transcribes the audio and dispatches the
 * text to the injector (dictation) or to the action resolver (assistant).
 */

export { CapturePipeline, createCapturePipeline, type CapturePipelineDeps } from './CapturePipeline.js';
export { route } from './DispatchRouter.js';
export type { PipelineOutcome, Route, SessionPipeline, TranscriptResult } from './types.js';
