/**
 * Session CLI Commands
 */

import { Command } from 'commander';
import chalk from 'chalk';

import { isImagePurpose, isStylePreset, IMAGE_PURPOSES, STYLE_PRESETS } from '../../domain/image-chat/presets.js';
import { isSessionStatus, type SessionStatus } from '../../domain/image-chat/session.js';
import type { ISessionStore } from '../../infra/persistence/session-store.js';
import { describeError, formatMessageLine, formatSessionLine, formatStatus, formatTimestamp } from '../lib/format.js';
import { openSessionStore } from '../lib/open-store.js';

interface StoreOptions {
  db?: string;
}

/**
 * Open the store, run one operation and close it again. Exits non-zero on failure.
 */
function withStore(options: StoreOptions, run: (store: ISessionStore) => void): void {
  let store: ISessionStore | undefined;
  try {
    store = openSessionStore(options.db);
    run(store);
  } catch (error) {
    console.error(chalk.red(`✗ ${describeError(error)}`));
    process.exitCode = 1;
  } finally {
    store?.close();
  }
}

function parseCount(value: string, name: string): number {
  const parsed = parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative integer`);
  }
  return parsed;
}

function setStatus(id: string, status: SessionStatus, options: StoreOptions): void {
  withStore(options, (store) => {
    const updated = store.updateSession(id, { status });
    if (!updated) {
      console.error(chalk.red(`✗ Session not found: ${id}`));
      process.exitCode = 1;
      return;
    }
    console.log(chalk.green(`✓ Session ${id} is now ${formatStatus(updated.status)}`));
  });
}

export const sessionCommand = new Command('session')
  .description('Manage image chat sessions')
  .option('-d, --db <url>', 'Database URL (sqlite:///path or a file path)');

sessionCommand
  .command('create')
  .description('Create a new session')
  .requiredOption('--purpose <purpose>', `Image purpose (${IMAGE_PURPOSES.join(', ')})`)
  .option('--style <style>', `Style preset (${STYLE_PRESETS.join(', ')})`)
  .option('--title <title>', 'Session title')
  .action((options: { purpose: string; style?: string; title?: string }) => {
    const { purpose, style, title } = options;
    if (!isImagePurpose(purpose)) {
      console.error(chalk.red(`✗ Unknown purpose: ${purpose}`));
      process.exitCode = 1;
      return;
    }
    if (style !== undefined && !isStylePreset(style)) {
      console.error(chalk.red(`✗ Unknown style: ${style}`));
      process.exitCode = 1;
      return;
    }

    withStore(sessionCommand.opts<StoreOptions>(), (store) => {
      const session = store.createSession({ purpose, style, title });
      console.log(chalk.green(`✓ Created session ${chalk.cyan(session.id)}`));
      console.log(chalk.gray(`  Purpose: ${session.purpose}${session.style ? `, style: ${session.style}` : ''}`));
      console.log(chalk.gray(`  Connect: imgchat chat ${session.id}`));
    });
  });

sessionCommand
  .command('list')
  .description('List sessions, newest first')
  .option('-l, --limit <n>', 'Page size', '20')
  .option('-o, --offset <n>', 'Page offset', '0')
  .option('-s, --status <status>', 'Filter by status (active, completed, archived)')
  .action((options: { limit: string; offset: string; status?: string }) => {
    withStore(sessionCommand.opts<StoreOptions>(), (store) => {
      const status = options.status;
      if (status !== undefined && !isSessionStatus(status)) {
        throw new Error(`Unknown status: ${status}`);
      }

      const page = store.listSessions({
        limit: parseCount(options.limit, 'limit'),
        offset: parseCount(options.offset, 'offset'),
        status,
      });

      if (page.sessions.length === 0) {
        console.log(chalk.gray('No sessions found'));
        return;
      }

      for (const session of page.sessions) {
        console.log(formatSessionLine(session));
      }
      const last = page.offset + page.sessions.length;
      console.log(chalk.gray(`\nShowing ${page.offset + 1}-${last} of ${page.total}`));
    });
  });

sessionCommand
  .command('show <id>')
  .description('Show a session and its message log')
  .action((id: string) => {
    withStore(sessionCommand.opts<StoreOptions>(), (store) => {
      const session = store.getSession(id);
      if (!session) {
        console.error(chalk.red(`✗ Session not found: ${id}`));
        process.exitCode = 1;
        return;
      }

      console.log(formatSessionLine(session));
      console.log(chalk.gray(`  Created: ${formatTimestamp(session.createdAt)}`));
      console.log(chalk.gray(`  Updated: ${formatTimestamp(session.updatedAt)}`));
      console.log(chalk.gray(`  Tokens used: ${session.totalTokensUsed}`));
      if (session.lastImageId) {
        console.log(chalk.gray(`  Latest image: ${session.lastImageId}`));
      }
      console.log();
      for (const message of session.messages) {
        console.log(formatMessageLine(message));
      }
    });
  });

sessionCommand
  .command('archive <id>')
  .description('Archive a session')
  .action((id: string) => setStatus(id, 'archived', sessionCommand.opts<StoreOptions>()));

sessionCommand
  .command('complete <id>')
  .description('Mark a session as completed')
  .action((id: string) => setStatus(id, 'completed', sessionCommand.opts<StoreOptions>()));

sessionCommand
  .command('delete <id>')
  .description('Delete a session with its messages and images')
  .action((id: string) => {
    withStore(sessionCommand.opts<StoreOptions>(), (store) => {
      if (!store.deleteSession(id)) {
        console.error(chalk.red(`✗ Session not found: ${id}`));
        process.exitCode = 1;
        return;
      }
      console.log(chalk.green(`✓ Deleted session ${id}`));
    });
  });
