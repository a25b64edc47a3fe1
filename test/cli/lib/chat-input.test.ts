import { parseChatInput, type ChatSelection } from '../../../src/cli/lib/chat-input.js';

const IMAGE_ID = '1b4e28ba-2fa1-11d2-883f-0016d3cca427';

describe('parseChatInput', () => {
  test('blank lines are empty', () => {
    expect(parseChatInput('   ', {})).toEqual({ kind: 'empty' });
  });

  test('plain text is a converse turn', () => {
    expect(parseChatInput('  make it pop  ', {})).toEqual({ kind: 'send', type: 'converse', content: 'make it pop' });
  });

  test('a pending purpose and style ride along', () => {
    const selection: ChatSelection = { purpose: 'email_header', style: 'luxury' };

    expect(parseChatInput('/generate gold watch', selection)).toEqual({
      kind: 'send',
      type: 'generate',
      content: 'gold watch',
      data: { purpose: 'email_header', style: 'luxury' },
    });
  });

  test('/chat needs text', () => {
    expect(parseChatInput('/chat', {})).toEqual({ kind: 'invalid', message: '/chat needs some text' });
    expect(parseChatInput('/CHAT which font?', {})).toEqual({
      kind: 'send',
      type: 'chat',
      content: 'which font?',
    });
  });

  describe('/refine', () => {
    test('targets the latest image by default', () => {
      expect(parseChatInput('/refine warmer light', { lastImageId: 'img-9' })).toEqual({
        kind: 'send',
        type: 'refine',
        content: 'warmer light',
        data: { image_id: 'img-9' },
      });
    });

    test('accepts an explicit image id', () => {
      expect(parseChatInput(`/refine ${IMAGE_ID} crop tighter`, { lastImageId: 'img-9' })).toEqual({
        kind: 'send',
        type: 'refine',
        content: 'crop tighter',
        data: { image_id: IMAGE_ID },
      });
    });

    test('needs an image to refine', () => {
      expect(parseChatInput('/refine warmer', {})).toEqual({
        kind: 'invalid',
        message: 'No image to refine yet. Generate an image first.',
      });
    });

    test('needs feedback', () => {
      expect(parseChatInput(`/refine ${IMAGE_ID}`, {})).toEqual({
        kind: 'invalid',
        message: '/refine needs some text',
      });
    });
  });

  test('/purpose and /style validate their argument', () => {
    expect(parseChatInput('/purpose banner_mobile', {})).toEqual({ kind: 'purpose', purpose: 'banner_mobile' });
    expect(parseChatInput('/purpose poster', {})).toEqual({ kind: 'invalid', message: 'Unknown purpose: poster' });
    expect(parseChatInput('/style tech', {})).toEqual({ kind: 'style', style: 'tech' });
    expect(parseChatInput('/style', {})).toEqual({ kind: 'invalid', message: 'Unknown style: (none)' });
  });

  test('local commands', () => {
    expect(parseChatInput('/help', {})).toEqual({ kind: 'help' });
    expect(parseChatInput('/quit', {})).toEqual({ kind: 'quit' });
    expect(parseChatInput('/exit', {})).toEqual({ kind: 'quit' });
    expect(parseChatInput('/dance', {})).toEqual({
      kind: 'invalid',
      message: 'Unknown command: /dance. Type /help for commands.',
    });
  });
});
