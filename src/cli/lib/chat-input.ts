/**
 * Parses interactive chat lines into intents or local commands.
 * Plain lines are `converse`; slash commands pick an intent or change selection.
 */

import type { IntentKind } from '../../domain/image-chat/intents.js';
import {
  isImagePurpose,
  isStylePreset,
  type ImagePurpose,
  type StylePreset,
} from '../../domain/image-chat/presets.js';
import type { FrameOptions } from '../gateway/image-chat-client.js';

export interface ChatSelection {
  purpose?: ImagePurpose;
  style?: StylePreset;
  lastImageId?: string;
}

export type ChatInput =
  | { kind: 'send'; type: IntentKind; content: string; data?: FrameOptions }
  | { kind: 'purpose'; purpose: ImagePurpose }
  | { kind: 'style'; style: StylePreset }
  | { kind: 'help' }
  | { kind: 'quit' }
  | { kind: 'empty' }
  | { kind: 'invalid'; message: string };

export const CHAT_HELP = [
  '  <text>                 talk about the image (may create or update it)',
  '  /chat <text>           ask for advice only',
  '  /generate <prompt>     generate a new image',
  '  /refine [id] <text>    refine the latest image (or image <id>)',
  '  /purpose <purpose>     change the image purpose',
  '  /style <style>         change the style preset',
  '  /help                  show this help',
  '  /quit                  leave the chat',
].join('\n');

const IMAGE_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

function selectionData(selection: ChatSelection): FrameOptions | undefined {
  const data: FrameOptions = {};
  if (selection.purpose) data.purpose = selection.purpose;
  if (selection.style) data.style = selection.style;
  return Object.keys(data).length > 0 ? data : undefined;
}

function send(type: IntentKind, content: string, data?: FrameOptions): ChatInput {
  if (!content) {
    return { kind: 'invalid', message: `/${type} needs some text` };
  }
  return data ? { kind: 'send', type, content, data } : { kind: 'send', type, content };
}

export function parseChatInput(line: string, selection: ChatSelection): ChatInput {
  const trimmed = line.trim();
  if (!trimmed) return { kind: 'empty' };

  if (!trimmed.startsWith('/')) {
    return send('converse', trimmed, selectionData(selection));
  }

  const spaceAt = trimmed.indexOf(' ');
  const command = (spaceAt === -1 ? trimmed : trimmed.slice(0, spaceAt)).toLowerCase();
  const rest = spaceAt === -1 ? '' : trimmed.slice(spaceAt + 1).trim();

  switch (command) {
    case '/quit':
    case '/exit':
      return { kind: 'quit' };

    case '/help':
      return { kind: 'help' };

    case '/chat':
      return send('chat', rest, selectionData(selection));

    case '/generate':
      return send('generate', rest, selectionData(selection));

    case '/refine': {
      const [first, ...others] = rest.split(/\s+/);
      const explicitId = first && IMAGE_ID_PATTERN.test(first) ? first : undefined;
      const feedback = explicitId ? others.join(' ') : rest;
      const imageId = explicitId ?? selection.lastImageId;
      if (!imageId) {
        return { kind: 'invalid', message: 'No image to refine yet. Generate an image first.' };
      }
      return send('refine', feedback, { image_id: imageId });
    }

    case '/purpose':
      return isImagePurpose(rest)
        ? { kind: 'purpose', purpose: rest }
        : { kind: 'invalid', message: `Unknown purpose: ${rest || '(none)'}` };

    case '/style':
      return isStylePreset(rest)
        ? { kind: 'style', style: rest }
        : { kind: 'invalid', message: `Unknown style: ${rest || '(none)'}` };

    default:
      return { kind: 'invalid', message: `Unknown command: ${command}. Type /help for commands.` };
  }
}
