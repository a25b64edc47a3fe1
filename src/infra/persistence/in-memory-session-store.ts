/**
 * In-memory session store
 * Used by tests and by `imgchat serve --memory`
 */

import * as crypto from 'crypto';

import type {
  IImageChatSession,
  IChatMessage,
  IGeneratedImage,
  ISessionDetail,
  ISessionPage,
  ICreateSessionInput,
  ISessionPatch,
  NewChatMessage,
} from '../../domain/image-chat/session.js';
import { toDataUrl } from '../../domain/image-chat/session.js';
import {
  SessionStoreError,
  DEFAULT_PAGE_LIMIT,
  type ISessionStore,
  type ListSessionsOptions,
  type NewGeneratedImage,
} from './session-store.js';

interface StoredSession {
  session: IImageChatSession;
  messages: IChatMessage[];
  images: Map<string, IGeneratedImage>;
}

export class InMemorySessionStore implements ISessionStore {
  private sessions = new Map<string, StoredSession>();

  createSession(input: ICreateSessionInput): IImageChatSession {
    const id = input.id ?? crypto.randomUUID();
    if (this.sessions.has(id)) {
      throw new SessionStoreError(`Session already exists: ${id}`, id);
    }

    const now = Date.now();
    const session: IImageChatSession = {
      id,
      title: input.title,
      purpose: input.purpose,
      style: input.style,
      status: 'active',
      messagesCount: 0,
      imagesGenerated: 0,
      totalTokensUsed: 0,
      createdAt: now,
      updatedAt: now,
    };
    this.sessions.set(id, { session, messages: [], images: new Map() });
    return { ...session };
  }

  getSessionSummary(id: string): IImageChatSession | null {
    const stored = this.sessions.get(id);
    return stored ? { ...stored.session } : null;
  }

  getSession(id: string): ISessionDetail | null {
    const stored = this.sessions.get(id);
    if (!stored) return null;
    return { ...stored.session, messages: stored.messages.map(m => ({ ...m })) };
  }

  listSessions(options: ListSessionsOptions = {}): ISessionPage {
    const limit = options.limit ?? DEFAULT_PAGE_LIMIT;
    const offset = options.offset ?? 0;

    // Newest first; insertion order breaks ties
    const all = Array.from(this.sessions.values())
      .map(s => s.session)
      .reverse()
      .filter(s => !options.status || s.status === options.status)
      .sort((a, b) => b.createdAt - a.createdAt);

    return {
      sessions: all.slice(offset, offset + limit).map(s => ({ ...s })),
      total: all.length,
      limit,
      offset,
    };
  }

  updateSession(id: string, patch: ISessionPatch): IImageChatSession | null {
    const stored = this.sessions.get(id);
    if (!stored) return null;

    const session = stored.session;
    if (patch.title !== undefined) session.title = patch.title;
    if (patch.purpose !== undefined) session.purpose = patch.purpose;
    if (patch.style === null) session.style = undefined;
    else if (patch.style !== undefined) session.style = patch.style;
    if (patch.status !== undefined) session.status = patch.status;
    session.updatedAt = Date.now();

    return { ...session };
  }

  deleteSession(id: string): boolean {
    return this.sessions.delete(id);
  }

  appendMessage(sessionId: string, message: NewChatMessage, image?: NewGeneratedImage): IChatMessage {
    const stored = this.sessions.get(sessionId);
    if (!stored) {
      throw new SessionStoreError(`Session not found: ${sessionId}`, sessionId);
    }

    const now = Date.now();
    const appended: IChatMessage = {
      ...message,
      id: message.id ?? crypto.randomUUID(),
      sessionId,
      sequence: stored.messages.length + 1,
      createdAt: now,
      ...(image && { imageId: image.id, imageUrl: toDataUrl(image) }),
    };
    stored.messages.push(appended);

    const session = stored.session;
    session.messagesCount += 1;
    session.totalTokensUsed += appended.tokensUsed;
    session.updatedAt = now;

    if (image) {
      stored.images.set(image.id, { ...image, sessionId, messageId: appended.id, createdAt: now });
      session.imagesGenerated += 1;
      session.lastImageId = image.id;
      session.finalImageUrl = appended.imageUrl;
    }

    return { ...appended };
  }

  getImage(sessionId: string, imageId: string): IGeneratedImage | null {
    const image = this.sessions.get(sessionId)?.images.get(imageId);
    return image ? { ...image } : null;
  }

  getRecentMessages(sessionId: string, limit: number): IChatMessage[] {
    const stored = this.sessions.get(sessionId);
    if (!stored || limit <= 0) return [];
    return stored.messages.slice(-limit).map(m => ({ ...m }));
  }

  close(): void {
    this.sessions.clear();
  }
}
