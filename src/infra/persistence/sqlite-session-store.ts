/**
 * SQLite Session Store
 * Persistent storage for image chat sessions, messages and generated images
 */

import type Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';

import type {
  IImageChatSession,
  IChatMessage,
  IGeneratedImage,
  ISessionDetail,
  ISessionPage,
  ICreateSessionInput,
  ISessionPatch,
  NewChatMessage,
  IMessageMetadata,
} from '../../domain/image-chat/session.js';
import { toDataUrl, isSessionStatus, isContentKind } from '../../domain/image-chat/session.js';
import { isImagePurpose, isStylePreset, DEFAULT_PURPOSE } from '../../domain/image-chat/presets.js';
import {
  SessionStoreError,
  errorMessage,
  DEFAULT_PAGE_LIMIT,
  type ISessionStore,
  type ListSessionsOptions,
  type NewGeneratedImage,
} from './session-store.js';

// ============================================================================
// Database Row Types
// ============================================================================

interface SessionRow {
  id: string;
  title: string | null;
  purpose: string;
  style: string | null;
  status: string;
  messages_count: number;
  images_generated: number;
  total_tokens_used: number;
  final_image_url: string | null;
  last_image_id: string | null;
  created_at: number;
  updated_at: number;
}

interface MessageRow {
  id: string;
  session_id: string;
  sequence: number;
  role: string;
  content_kind: string;
  text_content: string | null;
  image_id: string | null;
  image_url: string | null;
  tokens_used: number;
  generation_time_ms: number | null;
  metadata: string | null;
  created_at: number;
}

interface ImageRow {
  id: string;
  session_id: string;
  message_id: string;
  mime_type: string;
  data: string;
  width: number | null;
  height: number | null;
  prompt_used: string;
  model_used: string;
  purpose: string;
  created_at: number;
}

// ============================================================================
// SQLite Session Store
// ============================================================================

export class SqliteSessionStore implements ISessionStore {
  constructor(private db: Database.Database) {}

  /**
   * Initialize session tables
   */
  initialize(): void {
    this.db.pragma('foreign_keys = ON');
    this.db.exec(`
      -- Sessions Table
      CREATE TABLE IF NOT EXISTS image_chat_sessions (
        id TEXT PRIMARY KEY,
        title TEXT,
        purpose TEXT NOT NULL,
        style TEXT,
        status TEXT NOT NULL DEFAULT 'active',
        messages_count INTEGER NOT NULL DEFAULT 0,
        images_generated INTEGER NOT NULL DEFAULT 0,
        total_tokens_used INTEGER NOT NULL DEFAULT 0,
        final_image_url TEXT,
        last_image_id TEXT,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      -- Messages Table
      CREATE TABLE IF NOT EXISTS image_chat_messages (
        id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL,
        sequence INTEGER NOT NULL,
        role TEXT NOT NULL,
        content_kind TEXT NOT NULL,
        text_content TEXT,
        image_id TEXT,
        image_url TEXT,
        tokens_used INTEGER NOT NULL DEFAULT 0,
        generation_time_ms INTEGER,
        metadata TEXT,
        created_at INTEGER NOT NULL,
        UNIQUE (session_id, sequence),
        FOREIGN KEY (session_id) REFERENCES image_chat_sessions(id) ON DELETE CASCADE
      );

      -- Generated Images Table
      CREATE TABLE IF NOT EXISTS generated_images (
        id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL,
        message_id TEXT NOT NULL,
        mime_type TEXT NOT NULL,
        data TEXT NOT NULL,
        width INTEGER,
        height INTEGER,
        prompt_used TEXT NOT NULL,
        model_used TEXT NOT NULL,
        purpose TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        FOREIGN KEY (session_id) REFERENCES image_chat_sessions(id) ON DELETE CASCADE,
        FOREIGN KEY (message_id) REFERENCES image_chat_messages(id) ON DELETE CASCADE
      );

      -- Indexes
      CREATE INDEX IF NOT EXISTS idx_sessions_created ON image_chat_sessions(created_at DESC);
      CREATE INDEX IF NOT EXISTS idx_sessions_status ON image_chat_sessions(status);
      CREATE INDEX IF NOT EXISTS idx_messages_session ON image_chat_messages(session_id, sequence);
      CREATE INDEX IF NOT EXISTS idx_images_session ON generated_images(session_id);
    `);
  }

  private parseSessionRow(row: SessionRow): IImageChatSession {
    return {
      id: row.id,
      title: row.title ?? undefined,
      purpose: isImagePurpose(row.purpose) ? row.purpose : DEFAULT_PURPOSE,
      style: isStylePreset(row.style) ? row.style : undefined,
      status: isSessionStatus(row.status) ? row.status : 'active',
      messagesCount: row.messages_count,
      imagesGenerated: row.images_generated,
      totalTokensUsed: row.total_tokens_used,
      finalImageUrl: row.final_image_url ?? undefined,
      lastImageId: row.last_image_id ?? undefined,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  private parseMessageRow(row: MessageRow): IChatMessage {
    const metadata: IMessageMetadata | undefined = row.metadata ? JSON.parse(row.metadata) : undefined;
    return {
      id: row.id,
      sessionId: row.session_id,
      sequence: row.sequence,
      role: row.role === 'assistant' ? 'assistant' : 'user',
      contentKind: isContentKind(row.content_kind) ? row.content_kind : 'text',
      text: row.text_content ?? undefined,
      imageId: row.image_id ?? undefined,
      imageUrl: row.image_url ?? undefined,
      tokensUsed: row.tokens_used,
      generationTimeMs: row.generation_time_ms ?? undefined,
      metadata,
      createdAt: row.created_at,
    };
  }

  private parseImageRow(row: ImageRow): IGeneratedImage {
    return {
      id: row.id,
      sessionId: row.session_id,
      messageId: row.message_id,
      mimeType: row.mime_type,
      base64: row.data,
      width: row.width ?? undefined,
      height: row.height ?? undefined,
      promptUsed: row.prompt_used,
      modelUsed: row.model_used,
      purpose: isImagePurpose(row.purpose) ? row.purpose : DEFAULT_PURPOSE,
      createdAt: row.created_at,
    };
  }

  createSession(input: ICreateSessionInput): IImageChatSession {
    const now = Date.now();
    const id = input.id ?? randomUUID();

    const stmt = this.db.prepare(`
      INSERT INTO image_chat_sessions (
        id, title, purpose, style, status, created_at, updated_at
      ) VALUES (?, ?, ?, ?, 'active', ?, ?)
    `);

    try {
      stmt.run(id, input.title ?? null, input.purpose, input.style ?? null, now, now);
    } catch (error) {
      throw new SessionStoreError(`Failed to create session ${id}: ${errorMessage(error)}`, id);
    }

    return {
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
  }

  getSessionSummary(id: string): IImageChatSession | null {
    const stmt = this.db.prepare('SELECT * FROM image_chat_sessions WHERE id = ?');
    const row = stmt.get(id) as SessionRow | undefined;
    return row ? this.parseSessionRow(row) : null;
  }

  getSession(id: string): ISessionDetail | null {
    const session = this.getSessionSummary(id);
    if (!session) return null;

    const stmt = this.db.prepare(`
      SELECT * FROM image_chat_messages
      WHERE session_id = ?
      ORDER BY sequence ASC
    `);
    const rows = stmt.all(id) as MessageRow[];
    return { ...session, messages: rows.map(r => this.parseMessageRow(r)) };
  }

  listSessions(options: ListSessionsOptions = {}): ISessionPage {
    const limit = options.limit ?? DEFAULT_PAGE_LIMIT;
    const offset = options.offset ?? 0;
    const where = options.status ? 'WHERE status = ?' : '';
    const filter = options.status ? [options.status] : [];

    const countRow = this.db
      .prepare(`SELECT COUNT(*) as count FROM image_chat_sessions ${where}`)
      .get(...filter) as { count: number };

    const rows = this.db
      .prepare(`
        SELECT * FROM image_chat_sessions ${where}
        ORDER BY created_at DESC, rowid DESC
        LIMIT ? OFFSET ?
      `)
      .all(...filter, limit, offset) as SessionRow[];

    return {
      sessions: rows.map(row => this.parseSessionRow(row)),
      total: countRow.count,
      limit,
      offset,
    };
  }

  updateSession(id: string, patch: ISessionPatch): IImageChatSession | null {
    const existing = this.getSessionSummary(id);
    if (!existing) return null;

    const style = patch.style === null ? null : (patch.style ?? existing.style ?? null);

    const stmt = this.db.prepare(`
      UPDATE image_chat_sessions SET
        title = ?,
        purpose = ?,
        style = ?,
        status = ?,
        updated_at = ?
      WHERE id = ?
    `);

    stmt.run(
      patch.title ?? existing.title ?? null,
      patch.purpose ?? existing.purpose,
      style,
      patch.status ?? existing.status,
      Date.now(),
      id
    );

    return this.getSessionSummary(id);
  }

  deleteSession(id: string): boolean {
    // Messages and images are deleted via CASCADE
    const stmt = this.db.prepare('DELETE FROM image_chat_sessions WHERE id = ?');
    const result = stmt.run(id);
    return result.changes > 0;
  }

  appendMessage(sessionId: string, message: NewChatMessage, image?: NewGeneratedImage): IChatMessage {
    const append = this.db.transaction((): IChatMessage => {
      const session = this.getSessionSummary(sessionId);
      if (!session) {
        throw new SessionStoreError(`Session not found: ${sessionId}`, sessionId);
      }

      const now = Date.now();
      const seqRow = this.db
        .prepare('SELECT COALESCE(MAX(sequence), 0) + 1 AS next FROM image_chat_messages WHERE session_id = ?')
        .get(sessionId) as { next: number };

      const stored: IChatMessage = {
        ...message,
        id: message.id ?? randomUUID(),
        sessionId,
        sequence: seqRow.next,
        createdAt: now,
        ...(image && { imageId: image.id, imageUrl: toDataUrl(image) }),
      };

      this.db.prepare(`
        INSERT INTO image_chat_messages (
          id, session_id, sequence, role, content_kind, text_content, image_id, image_url,
          tokens_used, generation_time_ms, metadata, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        stored.id,
        sessionId,
        stored.sequence,
        stored.role,
        stored.contentKind,
        stored.text ?? null,
        stored.imageId ?? null,
        stored.imageUrl ?? null,
        stored.tokensUsed,
        stored.generationTimeMs ?? null,
        stored.metadata ? JSON.stringify(stored.metadata) : null,
        now
      );

      if (image) {
        this.db.prepare(`
          INSERT INTO generated_images (
            id, session_id, message_id, mime_type, data, width, height,
            prompt_used, model_used, purpose, created_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `).run(
          image.id,
          sessionId,
          stored.id,
          image.mimeType,
          image.base64,
          image.width ?? null,
          image.height ?? null,
          image.promptUsed,
          image.modelUsed,
          image.purpose,
          now
        );
      }

      this.db.prepare(`
        UPDATE image_chat_sessions SET
          messages_count = messages_count + 1,
          total_tokens_used = total_tokens_used + ?,
          images_generated = images_generated + ?,
          final_image_url = COALESCE(?, final_image_url),
          last_image_id = COALESCE(?, last_image_id),
          updated_at = ?
        WHERE id = ?
      `).run(
        stored.tokensUsed,
        image ? 1 : 0,
        stored.imageUrl ?? null,
        image?.id ?? null,
        now,
        sessionId
      );

      return stored;
    });

    try {
      return append();
    } catch (error) {
      if (error instanceof SessionStoreError) throw error;
      throw new SessionStoreError(`Failed to append message: ${errorMessage(error)}`, sessionId);
    }
  }

  getImage(sessionId: string, imageId: string): IGeneratedImage | null {
    const stmt = this.db.prepare('SELECT * FROM generated_images WHERE id = ? AND session_id = ?');
    const row = stmt.get(imageId, sessionId) as ImageRow | undefined;
    return row ? this.parseImageRow(row) : null;
  }

  /**
   * Get recent messages for a session (for the context window)
   */
  getRecentMessages(sessionId: string, limit: number): IChatMessage[] {
    const stmt = this.db.prepare(`
      SELECT * FROM image_chat_messages
      WHERE session_id = ?
      ORDER BY sequence DESC
      LIMIT ?
    `);
    const rows = stmt.all(sessionId, limit) as MessageRow[];
    // Reverse to get chronological order
    return rows.map(r => this.parseMessageRow(r)).reverse();
  }

  close(): void {
    this.db.close();
  }
}
