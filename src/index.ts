export * from './domain/image-chat/index.js';
export * from './gateway/index.js';
export * from './infra/config/index.js';
export * from './infra/generation/index.js';

export {
  type ISessionStore,
  type ListSessionsOptions,
  type NewGeneratedImage,
  SessionStoreError,
  DEFAULT_PAGE_LIMIT,
} from './infra/persistence/session-store.js';
export { SqliteSessionStore } from './infra/persistence/sqlite-session-store.js';
export { InMemorySessionStore } from './infra/persistence/in-memory-session-store.js';

export * from './cli/gateway/index.js';

export { debug, debugEmitter, type DebugEvent } from './debug/index.js';
