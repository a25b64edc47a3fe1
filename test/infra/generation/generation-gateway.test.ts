import {
  GenerationGateway,
  toGenerationFailure,
  type GenerationRequest,
} from '../../../src/infra/generation/generation-gateway.js';
import { GenerationFailure } from '../../../src/infra/generation/image-backend.js';
import { CONSULTANT_INSTRUCTION } from '../../../src/infra/generation/prompt-builder.js';
import { ScriptedBackend, flush, pngPayload } from '../../helpers/scripted-backend.js';

function request(overrides: Partial<GenerationRequest> = {}): GenerationRequest {
  return {
    mode: 'generate',
    content: 'a ceramic mug',
    purpose: 'product_showcase',
    context: [],
    ...overrides,
  };
}

describe('GenerationGateway', () => {
  let backend: ScriptedBackend;
  let gateway: GenerationGateway;

  beforeEach(() => {
    backend = new ScriptedBackend();
    gateway = new GenerationGateway(backend, { timeoutMs: 1000 });
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  test('returns the image with the preset size and the prompt sent', async () => {
    const pending = gateway.invoke(request());
    await flush();
    backend.resolveImage(0, 'Here it is.');

    const result = await pending;

    expect(result).toEqual({
      text: 'Here it is.',
      image: pngPayload(),
      elapsedMs: expect.any(Number),
      tokensUsed: 10,
      model: 'test-model',
      promptUsed:
        'Image dimensions: 1000x1000px. product-focused, clean background, professional lighting. a ceramic mug',
      width: 1000,
      height: 1000,
    });
    expect(backend.requests[0]).toMatchObject({ mode: 'generate', aspectRatio: '1:1', allowImage: true });
  });

  test('chat requests go out as text-only consultations', async () => {
    const pending = gateway.invoke(
      request({ mode: 'chat', content: 'which colours?', priorImage: pngPayload() })
    );
    await flush();

    expect(backend.requests[0]).toMatchObject({
      prompt: 'which colours?',
      systemInstruction: CONSULTANT_INSTRUCTION,
      allowImage: false,
      priorImage: undefined,
    });

    backend.resolveImage(0, 'Try teal.');
    const result = await pending;
    expect(result.text).toBe('Try teal.');
    expect(result.image).toBeUndefined();
    expect(result.width).toBeUndefined();
  });

  test('converse requests carry the purpose in the system instruction', async () => {
    const pending = gateway.invoke(request({ mode: 'converse', content: 'hi', purpose: 'banner_web' }));
    await flush();

    expect(backend.requests[0].prompt).toBe('hi');
    expect(backend.requests[0].systemInstruction).toContain('Target format: Web Banner (3:1).');
    expect(backend.requests[0].aspectRatio).toBe('16:9');

    backend.resolve(0, { text: 'Hello!' });
    await expect(pending).resolves.toMatchObject({ text: 'Hello!', promptUsed: 'hi' });
  });

  test('generate without an image in the response fails', async () => {
    const pending = gateway.invoke(request());
    await flush();
    backend.resolve(0, { text: 'I cannot draw that' });

    await expect(pending).rejects.toMatchObject({
      kind: 'Unknown',
      message: 'Backend response contained no image',
      backend: 'scripted',
    });
  });

  test('blank responses fail', async () => {
    const pending = gateway.invoke(request({ mode: 'converse' }));
    await flush();
    backend.resolve(0, { text: '   ' });

    await expect(pending).rejects.toThrow('Backend returned an empty response');
  });

  test('classified backend failures pass through', async () => {
    const pending = gateway.invoke(request());
    await flush();
    backend.reject(0, new GenerationFailure('InvalidInput', 'prompt blocked', 'scripted'));

    await expect(pending).rejects.toMatchObject({ kind: 'InvalidInput', message: 'prompt blocked' });
  });

  test('other errors become Unknown failures', async () => {
    const pending = gateway.invoke(request());
    await flush();
    backend.reject(0, new TypeError('boom'));

    const failure = await pending.catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(GenerationFailure);
    expect(failure).toMatchObject({ kind: 'Unknown', message: 'boom', backend: 'scripted' });
  });

  test('times out and aborts the backend call', async () => {
    jest.useFakeTimers();
    const pending = gateway.invoke(request());

    jest.advanceTimersByTime(1000);

    await expect(pending).rejects.toMatchObject({
      kind: 'Timeout',
      message: 'Generation timed out after 1000 ms',
    });
    expect(backend.calls[0].signal.aborted).toBe(true);
    backend.resolveImage(0);
  });
});

describe('toGenerationFailure', () => {
  test('wraps strings', () => {
    expect(toGenerationFailure('nope', 'gemini')).toMatchObject({
      kind: 'Unknown',
      message: 'nope',
      backend: 'gemini',
    });
  });
});
