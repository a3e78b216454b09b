export * from './domain/schemas';
export * from './domain/migrations';
export * from './errors';
export * from './commands';
export * from './logging/logger';
export * from './security/redact';
export * from './clients/types';
export * from './clients/openaiClient';
export * from './pipeline/types';
export * from './pipeline/prompts';
export * from './pipeline/dispatcher';
export * from './delivery/autoPaste';
export * from './session/audioScope';
export * from './session/context';
export * from './session/types';
export * from './session/keymap';
export * from './session/stateMachine';
export * from './settings/store';
export * from './presentation/labels';
