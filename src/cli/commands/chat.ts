/**
 * Chat Command - interactive terminal client for one image chat session
 */

import { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import ora from 'ora';
import { mkdirSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';

import type { ServerFrame } from '../../gateway/types.js';
import { loadRuntimeConfig } from '../../infra/config/runtime-config.js';
import { ImageChatClient } from '../gateway/index.js';
import { CHAT_HELP, parseChatInput, type ChatSelection } from '../lib/chat-input.js';
import { ReplyWaiter, type ReplyOutcome } from '../lib/reply-waiter.js';
import { describeError } from '../lib/format.js';

interface ChatOptions {
  url?: string;
  out?: string;
}

/** Headroom over the server's generation timeout before the prompt gives up */
const REPLY_GRACE_MS = 15_000;

const EXTENSIONS: Record<string, string> = {
  'image/png': 'png',
  'image/jpeg': 'jpg',
  'image/webp': 'webp',
};

function readString(data: Record<string, unknown> | undefined, key: string): string | undefined {
  const value = data?.[key];
  return typeof value === 'string' ? value : undefined;
}

function readNumber(data: Record<string, unknown> | undefined, key: string): number | undefined {
  const value = data?.[key];
  return typeof value === 'number' ? value : undefined;
}

function saveImage(imageUrl: string, imageId: string, dir: string): string | null {
  const match = /^data:([^;]+);base64,(.+)$/.exec(imageUrl);
  if (!match) return null;

  mkdirSync(dir, { recursive: true });
  const file = join(dir, `${imageId}.${EXTENSIONS[match[1]] ?? 'bin'}`);
  writeFileSync(file, Buffer.from(match[2], 'base64'));
  return file;
}

function printReply(frame: ServerFrame, selection: ChatSelection, outDir: string | undefined): void {
  if (frame.type === 'error') {
    const reason = readString(frame.data, 'reason');
    console.log(chalk.red(`✗ ${frame.content ?? 'Request failed'}${reason ? chalk.gray(` (${reason})`) : ''}`));
    return;
  }

  if (frame.content) {
    console.log(chalk.blue('Assistant: ') + frame.content);
  }

  const imageId = readString(frame.data, 'image_id');
  if (imageId) {
    selection.lastImageId = imageId;
    const width = readNumber(frame.data, 'width');
    const height = readNumber(frame.data, 'height');
    const size = width && height ? ` ${width}x${height}` : '';
    console.log(chalk.magenta(`  Image ${imageId}${size}`));

    if (outDir && frame.image_url) {
      const file = saveImage(frame.image_url, imageId, outDir);
      if (file) console.log(chalk.gray(`  Saved to ${file}`));
    }
  }

  const elapsed = readNumber(frame.data, 'generation_time_ms');
  if (elapsed !== undefined) {
    console.log(chalk.gray(`  ${readString(frame.data, 'model_used') ?? 'model'} in ${(elapsed / 1000).toFixed(1)}s`));
  }
}

/** Returns true when the request completed */
function printOutcome(
  outcome: ReplyOutcome,
  sessionId: string,
  selection: ChatSelection,
  outDir: string | undefined
): boolean {
  switch (outcome.kind) {
    case 'reply':
      printReply(outcome.frame, selection, outDir);
      return outcome.frame.type !== 'error';
    case 'reconnected':
      console.log(chalk.yellow('⚠ Reconnected before the reply arrived; it is saved in the session history'));
      if (outcome.lastImageId) {
        console.log(chalk.gray(`  Latest image: ${outcome.lastImageId}`));
      }
      console.log(chalk.gray(`  Run: imgchat session show ${sessionId}`));
      return false;
    case 'timeout':
      console.log(chalk.red(`✗ No reply after ${Math.round(outcome.timeoutMs / 1000)}s`));
      console.log(chalk.gray(`  Run: imgchat session show ${sessionId}`));
      return false;
    case 'closed':
      console.log(chalk.red('✗ Connection closed'));
      return false;
  }
}

function printConnected(frame: ServerFrame, selection: ChatSelection): void {
  const lastImageId = readString(frame.data, 'last_image_id');
  if (lastImageId) selection.lastImageId = lastImageId;

  const resumed = frame.data?.resumed === true;
  const purpose = readString(frame.data, 'purpose');
  const style = readString(frame.data, 'style');
  console.log(
    chalk.green(`✓ ${resumed ? 'Resumed' : 'Connected to'} session`) +
      chalk.gray(` (${purpose ?? 'unknown purpose'}${style ? `, ${style}` : ''})`)
  );
  if (lastImageId) {
    console.log(chalk.gray(`  Latest image: ${lastImageId}`));
  }
}

async function runChat(sessionId: string, options: ChatOptions): Promise<void> {
  const config = loadRuntimeConfig();
  const url = options.url ?? `ws://${config.gateway.host}:${config.gateway.port}`;
  const outDir = options.out ? resolve(options.out) : undefined;

  const selection: ChatSelection = {};
  let spinner: ora.Ora | null = null;
  const waiter = new ReplyWaiter({
    timeoutMs: config.generation.timeoutMs + REPLY_GRACE_MS,
    onProgress: (text) => {
      if (spinner) spinner.text = text;
    },
  });
  const client = new ImageChatClient({ url, sessionId });

  let firstConnect: (connected: boolean) => void = () => {};
  const connected = new Promise<boolean>((resolve) => {
    firstConnect = resolve;
  });

  client.onFrame = (frame) => {
    if (frame.type === 'status' && frame.content === 'Connected') {
      waiter.reconnected(readString(frame.data, 'last_image_id'));
      printConnected(frame, selection);
      firstConnect(true);
      return;
    }
    if (!waiter.deliver(frame)) {
      printReply(frame, selection, outDir);
    }
  };

  client.onStateChange = ({ to, attempt }) => {
    if (to === 'disconnected_pending_retry') {
      const text = 'Connection lost, reconnecting in 3s...';
      if (waiter.waiting && spinner) spinner.text = text;
      else console.log(chalk.yellow(`⚠ ${text}`));
    } else if (to === 'retrying' && !waiter.waiting) {
      console.log(chalk.gray(`  Reconnect attempt ${attempt}`));
    } else if (to === 'stopped') {
      firstConnect(false);
      waiter.closed();
    }
  };

  client.onDisconnected = (code, reason) => {
    if (code >= 4000) {
      console.log(chalk.red(`✗ Disconnected: ${reason || `code ${code}`}`));
    }
  };

  client.onError = (error) => {
    if (!waiter.waiting) console.log(chalk.gray(`  ${error.message}`));
  };

  console.log(chalk.cyan(`\nImage chat: ${client.url}`));
  console.log(chalk.gray('Type /help for commands.\n'));
  client.start();

  if (!(await connected)) {
    process.exitCode = 1;
    return;
  }

  while (client.state !== 'stopped') {
    const { line } = await inquirer.prompt<{ line: string }>([
      {
        type: 'input',
        name: 'line',
        message: chalk.green('You:'),
        prefix: '',
      },
    ]);

    const input = parseChatInput(line, selection);
    switch (input.kind) {
      case 'empty':
        continue;
      case 'quit':
        client.stop();
        console.log(chalk.cyan('\nGoodbye!\n'));
        return;
      case 'help':
        console.log(chalk.gray(CHAT_HELP));
        continue;
      case 'invalid':
        console.log(chalk.yellow(`⚠ ${input.message}`));
        continue;
      case 'purpose':
        selection.purpose = input.purpose;
        console.log(chalk.gray(`  Purpose set to ${input.purpose}; applies to your next message`));
        continue;
      case 'style':
        selection.style = input.style;
        console.log(chalk.gray(`  Style set to ${input.style}; applies to your next message`));
        continue;
      case 'send': {
        if (!client.send(input.type, input.content, input.data)) {
          console.log(chalk.yellow('⚠ Not connected yet, try again shortly'));
          continue;
        }
        const sending = ora('Sending...').start();
        spinner = sending;
        const outcome = await waiter.wait();
        sending.stop();
        spinner = null;
        if (printOutcome(outcome, sessionId, selection, outDir)) {
          selection.purpose = undefined;
          selection.style = undefined;
        }
      }
    }
  }
}

export const chatCommand = new Command('chat')
  .description('Open an interactive chat for a session')
  .argument('<sessionId>', 'Session to connect to')
  .option('-u, --url <url>', 'Gateway base URL (default from config)')
  .option('-o, --out <dir>', 'Save received images to this directory')
  .action(async (sessionId: string, options: ChatOptions) => {
    try {
      await runChat(sessionId, options);
    } catch (error) {
      console.error(chalk.red(`✗ Chat failed: ${describeError(error)}`));
      process.exitCode = 1;
    }
  });
