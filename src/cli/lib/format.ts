import chalk from 'chalk';

import type { IChatMessage, IImageChatSession, SessionStatus } from '../../domain/image-chat/session.js';

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const STATUS_COLORS: Record<SessionStatus, (text: string) => string> = {
  active: chalk.green,
  completed: chalk.blue,
  archived: chalk.gray,
};

export function formatStatus(status: SessionStatus): string {
  return STATUS_COLORS[status](status);
}

export function formatSessionLine(session: IImageChatSession): string {
  const title = session.title ? chalk.white(session.title) : chalk.gray('(untitled)');
  const style = session.style ? `/${session.style}` : '';
  return [
    chalk.cyan(session.id),
    formatStatus(session.status),
    title,
    chalk.gray(`${session.purpose}${style}`),
    chalk.gray(`${session.messagesCount} msgs, ${session.imagesGenerated} images`),
  ].join('  ');
}

export function formatMessageLine(message: IChatMessage): string {
  const who = message.role === 'user' ? chalk.green('you') : chalk.blue('assistant');
  const intent = message.metadata?.intent ? chalk.gray(`[${message.metadata.intent}]`) : '';
  const text = message.text ?? '';
  const image = message.imageId ? chalk.magenta(` <image ${message.imageId}>`) : '';
  return `  ${chalk.gray(`#${message.sequence}`)} ${who} ${intent} ${text}${image}`.trimEnd();
}

export function formatTimestamp(epochMs: number): string {
  return new Date(epochMs).toISOString();
}
