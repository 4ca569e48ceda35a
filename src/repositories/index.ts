// src/repositories/index.ts
export * from './RepositoryBase.js';
export * from './TaskRepository.js';
export * from './ConversationRepository.js';
export * from './InMemoryTaskStore.js';
export * from './InMemoryConversationLog.js';
