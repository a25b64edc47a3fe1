/**
 * Debug instrumentation API.
 *
 * Modules emit structured debug events that are printed by `imgchat serve --debug`.
 *
 * @example
 * ```typescript
 * import { debug, debugEmitter } from './debug/index.js';
 *
 * debugEmitter.enable();
 * debugEmitter.onDebug(event => console.log(event.type, event.data));
 *
 * debug.generationStarted('session-1', 'generate', 0);
 * ```
 */

export { debugEmitter } from './emitter.js';
export { debug } from './debug.js';
export type { DebugEvent, DebugContext } from './types.js';
