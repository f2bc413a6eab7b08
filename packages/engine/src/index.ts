export * from './types';
export * from './errors';
export * from './cards';
export { ACTION_RULES, classifyAction, classifyActions } from './actions';
export type { ActionRule, ClassifyResult } from './actions';
export { DiagnosticsCollector } from './diagnostics';
export type { Report } from './diagnostics';
export { findSection, markerFor, splitSections } from './sections';
export type { HandSection, SectionMarker } from './sections';
export { parseHeaderLine, probeHandId } from './header';
export { buildFlop, buildStreet, flopTexture, streetPlayers } from './street';
export { DEFAULT_OPTIONS, HandHistory, parseHandHeader, parseHandHistory } from './handHistory';
export type { HandHistoryState, HandHistoryStatus } from './handHistory';
