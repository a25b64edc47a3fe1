/**
 * Gateway Client Module - image chat client and its reconnect state machine
 */

export {
  ImageChatClient,
  buildSessionUrl,
  parseServerFrame,
  wsSocketFactory,
  type ImageChatClientOptions,
  type ClientSocket,
  type SocketFactory,
  type SocketHandlers,
  type FrameOptions,
} from './image-chat-client.js';
export {
  ReconnectStateMachine,
  RECONNECT_DELAY_MS,
  RECONNECT_TRANSITIONS,
  canTransitionReconnect,
  defaultScheduler,
  type ReconnectState,
  type ReconnectTransition,
  type ReconnectOptions,
  type Scheduler,
} from './reconnect-state-machine.js';
