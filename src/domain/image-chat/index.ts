export * from './presets.js';
export * from './session.js';
export * from './intents.js';
