// src/services/index.ts
export * from './ChatServiceTypes.js';
export * from './SynonymTable.js';
export * from './ReferenceResolver.js';
export * from './IntentClassifier.js';
export * from './OpenAiIntentModel.js';
export * from './ToolDispatcher.js';
export * from './ResponseComposer.js';
export * from './ChatTurnService.js';
