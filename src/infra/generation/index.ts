export * from './image-backend.js';
export * from './prompt-builder.js';
export * from './generation-gateway.js';
export { GeminiImageBackend, type GeminiBackendConfig } from './gemini-image-backend.js';
export { MockImageBackend, MOCK_PNG_BASE64, readsLikeImageRequest, type MockBackendOptions } from './mock-image-backend.js';
export { createImageBackend, type BackendSelection } from './backend-factory.js';
