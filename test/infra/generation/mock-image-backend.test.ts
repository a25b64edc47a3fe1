import type { BackendRequest } from '../../../src/infra/generation/image-backend.js';
import {
  MOCK_PNG_BASE64,
  MockImageBackend,
  readsLikeImageRequest,
} from '../../../src/infra/generation/mock-image-backend.js';

function request(overrides: Partial<BackendRequest>): BackendRequest {
  return {
    mode: 'chat',
    prompt: 'hello there',
    aspectRatio: '1:1',
    context: [],
    allowImage: true,
    ...overrides,
  };
}

describe('MockImageBackend', () => {
  const signal = new AbortController().signal;

  test('answers chat with text', async () => {
    const backend = new MockImageBackend();

    await expect(backend.generate(request({ allowImage: false }), signal)).resolves.toEqual({
      text: 'Mock response to: hello there',
      tokensUsed: 3,
      model: 'mock-image',
    });
  });

  test('returns a PNG for generate and refine', async () => {
    const backend = new MockImageBackend({ model: 'offline' });

    for (const mode of ['generate', 'refine'] as const) {
      const response = await backend.generate(request({ mode }), signal);
      expect(response.text).toBe('Here is your image.');
      expect(response.model).toBe('offline');
      expect(response.image?.mimeType).toBe('image/png');
      expect(response.image?.data.toString('base64')).toBe(MOCK_PNG_BASE64);
    }
  });

  test('converse draws only when asked for a picture', async () => {
    const backend = new MockImageBackend();

    const drawn = await backend.generate(request({ mode: 'converse', prompt: 'make a poster' }), signal);
    expect(drawn.text).toBe('Created an image for: make a poster');
    expect(drawn.image).toBeDefined();

    const talked = await backend.generate(request({ mode: 'converse', prompt: 'what fonts work?' }), signal);
    expect(talked.text).toBe('Mock response to: what fonts work?');
    expect(talked.image).toBeUndefined();
  });

  test('delayed replies stop when aborted', async () => {
    jest.useFakeTimers();
    try {
      const backend = new MockImageBackend({ delayMs: 5000 });
      const controller = new AbortController();

      const pending = backend.generate(request({}), controller.signal);
      controller.abort();

      await expect(pending).rejects.toMatchObject({ kind: 'Timeout', message: 'Mock generation aborted' });
    } finally {
      jest.useRealTimers();
    }
  });

  test.each([
    ['Please draw a cat', true],
    ['Can you make it bluer?', true],
    ['What is a good tagline?', false],
    ['imagine that', false],
  ])('readsLikeImageRequest(%s)', (text, expected) => {
    expect(readsLikeImageRequest(text)).toBe(expected);
  });
});
