import { GeminiImageBackend } from '../../../src/infra/generation/gemini-image-backend.js';
import type { BackendRequest } from '../../../src/infra/generation/image-backend.js';
import { MOCK_PNG_BASE64 } from '../../../src/infra/generation/mock-image-backend.js';
import { pngPayload } from '../../helpers/scripted-backend.js';

function request(overrides: Partial<BackendRequest> = {}): BackendRequest {
  return {
    mode: 'generate',
    prompt: 'a ceramic mug',
    aspectRatio: '1:1',
    context: [],
    allowImage: true,
    ...overrides,
  };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('GeminiImageBackend', () => {
  let fetchSpy: jest.SpiedFunction<typeof fetch>;
  let backend: GeminiImageBackend;
  const signal = new AbortController().signal;

  beforeEach(() => {
    fetchSpy = jest.spyOn(globalThis, 'fetch');
    backend = new GeminiImageBackend({ apiKey: 'test-secret', model: 'gemini-2.5-flash-image' });
    jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function sentBody(): Record<string, unknown> {
    const init = fetchSpy.mock.calls[0]?.[1];
    return JSON.parse(String(init?.body));
  }

  test('requires an API key', () => {
    expect(() => new GeminiImageBackend({ apiKey: '', model: 'm' })).toThrow('Gemini API key is required');
  });

  test('posts context, prior image and prompt to generateContent', async () => {
    fetchSpy.mockResolvedValue(
      jsonResponse({ candidates: [{ content: { parts: [{ inlineData: { mimeType: 'image/png', data: MOCK_PNG_BASE64 } }] } }] })
    );

    await backend.generate(
      request({
        mode: 'refine',
        prompt: 'make it blue',
        priorImage: pngPayload(),
        context: [
          { role: 'user', text: 'a mug' },
          { role: 'assistant', text: '[image img-1]' },
          { role: 'user', text: '  ' },
        ],
      }),
      signal
    );

    expect(fetchSpy.mock.calls[0]?.[0]).toBe(
      'https://generativelanguage.googleapis.com/v1beta/models/gemini-2.5-flash-image:generateContent?key=test-secret'
    );
    expect(fetchSpy.mock.calls[0]?.[1]?.method).toBe('POST');
    expect(sentBody()).toEqual({
      contents: [
        { role: 'user', parts: [{ text: 'a mug' }] },
        { role: 'model', parts: [{ text: '[image img-1]' }] },
        {
          role: 'user',
          parts: [{ inlineData: { mimeType: 'image/png', data: MOCK_PNG_BASE64 } }, { text: 'make it blue' }],
        },
      ],
      generationConfig: { responseModalities: ['TEXT', 'IMAGE'], imageConfig: { aspectRatio: '1:1' } },
    });
  });

  test('asks for text only when images are not allowed', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ candidates: [{ content: { parts: [{ text: 'Try teal.' }] } }] }));

    await backend.generate(
      request({ mode: 'chat', prompt: 'colours?', allowImage: false, systemInstruction: 'Be helpful' }),
      signal
    );

    expect(sentBody()).toMatchObject({
      systemInstruction: { parts: [{ text: 'Be helpful' }] },
      generationConfig: { responseModalities: ['TEXT'] },
    });
  });

  test('reads text, image, usage and model version', async () => {
    fetchSpy.mockResolvedValue(
      jsonResponse({
        candidates: [
          {
            content: {
              parts: [
                { text: 'Here is ' },
                { text: 'your mug.' },
                { inlineData: { mimeType: 'image/jpeg', data: MOCK_PNG_BASE64 } },
              ],
            },
          },
        ],
        usageMetadata: { promptTokenCount: 12, candidatesTokenCount: 30 },
        modelVersion: 'gemini-2.5-flash-image-001',
      })
    );

    const response = await backend.generate(request(), signal);

    expect(response.text).toBe('Here is your mug.');
    expect(response.image?.mimeType).toBe('image/jpeg');
    expect(response.image?.data.toString('base64')).toBe(MOCK_PNG_BASE64);
    expect(response.tokensUsed).toBe(42);
    expect(response.model).toBe('gemini-2.5-flash-image-001');
  });

  test('falls back to the configured model and zero tokens', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ candidates: [{ content: { parts: [{ text: 'ok' }] } }] }));

    await expect(backend.generate(request(), signal)).resolves.toEqual({
      text: 'ok',
      image: undefined,
      tokensUsed: 0,
      model: 'gemini-2.5-flash-image',
    });
  });

  test.each([
    [429, 'RateLimited'],
    [400, 'InvalidInput'],
    [503, 'UpstreamUnavailable'],
    [401, 'Unknown'],
  ])('classifies HTTP %i as %s', async (status, kind) => {
    fetchSpy.mockResolvedValue(jsonResponse({ error: { message: 'Resource exhausted' } }, status));

    await expect(backend.generate(request(), signal)).rejects.toMatchObject({
      kind,
      message: `Gemini API error (${status}): Resource exhausted`,
      backend: 'gemini',
    });
  });

  test('uses the status text when the error body is not JSON', async () => {
    fetchSpy.mockResolvedValue(new Response('oops', { status: 500, statusText: 'Internal Server Error' }));

    await expect(backend.generate(request(), signal)).rejects.toMatchObject({
      kind: 'UpstreamUnavailable',
      message: 'Gemini API error (500): Internal Server Error',
    });
  });

  test('network errors are upstream unavailable', async () => {
    fetchSpy.mockRejectedValue(new TypeError('fetch failed'));

    await expect(backend.generate(request(), signal)).rejects.toMatchObject({
      kind: 'UpstreamUnavailable',
      message: 'Gemini request failed: fetch failed',
    });
  });

  test('aborted requests are timeouts', async () => {
    const controller = new AbortController();
    controller.abort();
    fetchSpy.mockRejectedValue(new Error('This operation was aborted'));

    await expect(backend.generate(request(), controller.signal)).rejects.toMatchObject({
      kind: 'Timeout',
      message: 'Gemini request aborted',
    });
  });

  test('blocked prompts are invalid input', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ candidates: [], promptFeedback: { blockReason: 'SAFETY' } }));

    await expect(backend.generate(request(), signal)).rejects.toMatchObject({
      kind: 'InvalidInput',
      message: 'Gemini blocked request: SAFETY',
    });
  });

  test('safety stops are invalid input', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ candidates: [{ finishReason: 'IMAGE_SAFETY' }] }));

    await expect(backend.generate(request(), signal)).rejects.toMatchObject({
      kind: 'InvalidInput',
      message: 'Gemini refused the request: IMAGE_SAFETY',
    });
  });
});
