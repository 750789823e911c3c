export * from './types';
export * from './errors';
export * from './intent-parser';
export * from './transcript-filter';
export * from './search-client';
export * from './router';
export * from './answer-composer';
export * from './honor-code';
export * from './conversation';
export * from './session-store';
