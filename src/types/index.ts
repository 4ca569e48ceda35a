// Export all types and interfaces from this barrel file
export * from './taskTypes.js';
export * from './conversationTypes.js';
