/**
 * Tracing module.
 * Trace sinks are injected into the orchestrator; nothing here is global.
 */

export { NoopTraceSink, FanoutTraceSink, MemoryTraceSink } from './sink.js';
export type { TraceEvent, TraceEventType, TraceSink } from './sink.js';
export { JsonlTraceSink } from './jsonlSink.js';
export { ConsoleTraceSink } from './consoleSink.js';
