/**
 * Prompt building from purpose and style presets
 */

import {
  PURPOSE_PRESETS,
  STYLE_HINTS,
  type ImagePurpose,
  type StylePreset,
} from '../../domain/image-chat/presets.js';

export const CONSULTANT_INSTRUCTION = `You are a creative marketing image consultant.
Help users create effective marketing images by:
1. Understanding their goals and target audience
2. Suggesting visual concepts and compositions
3. Recommending colors, styles, and layouts
4. Providing feedback on their ideas

When the user is ready to generate an image, ask them to confirm.`;

export const CONVERSE_INSTRUCTION = `You are a creative marketing image assistant.
Answer questions about the campaign in text. When the user asks for an image,
or asks to change the current image, produce the image together with a short
explanation of what you made.`;

export function buildGeneratePrompt(prompt: string, purpose: ImagePurpose, style?: StylePreset): string {
  const preset = PURPOSE_PRESETS[purpose];
  const parts: string[] = [];

  if (preset.width && preset.height) {
    parts.push(`Image dimensions: ${preset.width}x${preset.height}px.`);
  }
  if (preset.hint) {
    parts.push(`${preset.hint}.`);
  }
  parts.push(prompt);

  const built = parts.join(' ');
  return style ? `${built}. Style: ${STYLE_HINTS[style]}` : built;
}

export function buildRefinePrompt(feedback: string): string {
  return `Please modify the previous image based on this feedback: ${feedback}`;
}

/**
 * System instruction for converse turns, carrying the session's format and tone
 */
export function buildConverseInstruction(purpose: ImagePurpose, style?: StylePreset): string {
  const preset = PURPOSE_PRESETS[purpose];
  const lines = [CONVERSE_INSTRUCTION, `Target format: ${preset.name} (${preset.ratio}).`];
  if (preset.hint) lines.push(`Composition: ${preset.hint}.`);
  if (style) lines.push(`Style: ${STYLE_HINTS[style]}.`);
  return lines.join('\n');
}
