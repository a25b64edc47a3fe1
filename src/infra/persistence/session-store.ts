import type {
  IImageChatSession,
  IChatMessage,
  IGeneratedImage,
  ISessionDetail,
  ISessionPage,
  ICreateSessionInput,
  ISessionPatch,
  NewChatMessage,
  SessionStatus,
} from '../../domain/image-chat/session.js';

/** Image bytes handed to the store together with the message that produced them */
export type NewGeneratedImage = Omit<IGeneratedImage, 'sessionId' | 'messageId' | 'createdAt'>;

export interface ListSessionsOptions {
  limit?: number;
  offset?: number;
  status?: SessionStatus;
}

/**
 * Durable store of sessions, their ordered message log and generated images.
 * Appends are synchronous so acceptance order equals log order.
 */
export interface ISessionStore {
  createSession(input: ICreateSessionInput): IImageChatSession;
  getSession(id: string): ISessionDetail | null;
  getSessionSummary(id: string): IImageChatSession | null;
  listSessions(options?: ListSessionsOptions): ISessionPage;
  updateSession(id: string, patch: ISessionPatch): IImageChatSession | null;
  deleteSession(id: string): boolean;

  /**
   * Append a message to the session log. When an image is given it is stored
   * in the same step and becomes the session's latest image.
   */
  appendMessage(sessionId: string, message: NewChatMessage, image?: NewGeneratedImage): IChatMessage;
  getImage(sessionId: string, imageId: string): IGeneratedImage | null;
  getRecentMessages(sessionId: string, limit: number): IChatMessage[];

  close(): void;
}

export class SessionStoreError extends Error {
  constructor(
    message: string,
    public readonly sessionId?: string
  ) {
    super(message);
    this.name = 'SessionStoreError';
  }
}

export const DEFAULT_PAGE_LIMIT = 20;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
