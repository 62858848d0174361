export type { MonotonicClock } from './clock';
export { performanceClock } from './clock';
export { SessionRecorder } from './SessionRecorder';
export type { SessionRecorderOptions, SessionSummary } from './SessionRecorder';
