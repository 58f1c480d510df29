export { TelemetryEmitter } from './emitter.js';
export type { TelemetryEvent, TelemetryEmitterConfig, EventType } from './types.js';
