import { ErrorCodes } from '../../../src/gateway/errors.js';
import { ProtocolEngine } from '../../../src/gateway/protocol/protocol-engine.js';
import { SessionRegistry } from '../../../src/gateway/session/session-registry.js';
import type { SessionState } from '../../../src/gateway/session/session-state.js';
import type { ServerFrame } from '../../../src/gateway/types.js';
import { GenerationGateway } from '../../../src/infra/generation/generation-gateway.js';
import { GenerationFailure } from '../../../src/infra/generation/image-backend.js';
import { MOCK_PNG_BASE64 } from '../../../src/infra/generation/mock-image-backend.js';
import { InMemorySessionStore } from '../../../src/infra/persistence/in-memory-session-store.js';
import { SessionStoreError } from '../../../src/infra/persistence/session-store.js';
import { FakeConnection } from '../../helpers/fake-connection.js';
import { ScriptedBackend, flush } from '../../helpers/scripted-backend.js';

function frame(type: string, content: string, data?: Record<string, unknown>): string {
  return JSON.stringify(data ? { type, content, data } : { type, content });
}

function dataOf(frame: ServerFrame | undefined): Record<string, unknown> {
  return frame?.data ?? {};
}

describe('ProtocolEngine', () => {
  let store: InMemorySessionStore;
  let backend: ScriptedBackend;
  let registry: SessionRegistry;
  let engine: ProtocolEngine;

  function openSession(id: string, purpose: 'product_showcase' | 'banner_web' = 'product_showcase') {
    store.createSession({ id, purpose });
    const state = registry.acquire(id);
    if (!state) throw new Error(`session ${id} was not created`);
    const connection = new FakeConnection();
    state.bind(connection);
    return { state, connection };
  }

  beforeEach(() => {
    store = new InMemorySessionStore();
    backend = new ScriptedBackend();
    registry = new SessionRegistry(store, { contextWindow: 10 });
    engine = new ProtocolEngine(store, new GenerationGateway(backend, { timeoutMs: 60_000 }));
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('product showcase generate then refine', () => {
    let state: SessionState;
    let connection: FakeConnection;

    beforeEach(() => {
      ({ state, connection } = openSession('s1'));
    });

    test('generate emits one status and one image frame and logs two entries', async () => {
      const done = engine.handleFrame(state, frame('generate', 'a ceramic mug'));
      await flush();
      backend.resolveImage(0);
      await done;

      const frames = connection.frames;
      expect(frames.map(f => f.type)).toEqual(['status', 'image']);

      const messages = store.getSession('s1')?.messages ?? [];
      expect(messages.map(m => [m.sequence, m.role, m.contentKind])).toEqual([
        [1, 'user', 'text'],
        [2, 'assistant', 'image'],
      ]);

      expect(frames[0].content).toBe('Generating image...');
      expect(frames[0].data).toEqual({ step: 'generating', message_id: messages[0].id });

      const image = frames[1];
      expect(image.content).toBe('Image generated.');
      expect(image.image_url).toBe(`data:image/png;base64,${MOCK_PNG_BASE64}`);
      expect(dataOf(image)).toEqual({
        message_id: messages[1].id,
        generation_time_ms: expect.any(Number),
        model_used: 'test-model',
        tokens_used: 10,
        image_id: messages[1].imageId,
        prompt_used:
          'Image dimensions: 1000x1000px. product-focused, clean background, professional lighting. a ceramic mug',
        width: 1000,
        height: 1000,
      });

      expect(state.lastImage()?.id).toBe(messages[1].imageId);
      expect(store.getSessionSummary('s1')?.lastImageId).toBe(messages[1].imageId);
      expect(state.messageCount).toBe(2);
    });

    test('refine sends the latest image back and moves the pointer', async () => {
      const generated = engine.handleFrame(state, frame('generate', 'a ceramic mug'));
      await flush();
      backend.resolveImage(0);
      await generated;
      const firstImageId = state.lastImage()?.id;
      expect(firstImageId).toBeDefined();

      const refined = engine.handleFrame(
        state,
        frame('refine', 'make the background blue', { image_id: firstImageId })
      );
      await flush();
      backend.resolveImage(1);
      await refined;

      expect(backend.requests[1]).toMatchObject({
        mode: 'refine',
        prompt: 'Please modify the previous image based on this feedback: make the background blue',
        aspectRatio: '1:1',
      });
      expect(backend.requests[1].priorImage?.data.toString('base64')).toBe(MOCK_PNG_BASE64);

      const frames = connection.frames;
      expect(frames.map(f => f.type)).toEqual(['status', 'image', 'status', 'image']);
      expect(frames[2].content).toBe('Refining image...');
      expect(frames[3].content).toBe('Image refined.');

      const messages = store.getSession('s1')?.messages ?? [];
      expect(messages).toHaveLength(4);
      expect(messages[2].metadata).toEqual({ intent: 'refine', refinedFrom: firstImageId });
      expect(messages[3].metadata?.refinedFrom).toBe(firstImageId);

      const secondImageId = dataOf(frames[3]).image_id;
      expect(secondImageId).toBe(messages[3].imageId);
      expect(secondImageId).not.toBe(firstImageId);
      expect(state.lastImage()?.id).toBe(secondImageId);
      expect(store.getSessionSummary('s1')?.lastImageId).toBe(secondImageId);
    });
  });

  describe('ordering and single flight', () => {
    test('terminal frames follow acceptance order even when the later request is faster', async () => {
      const { state, connection } = openSession('s1');

      const slow = engine.handleFrame(state, frame('generate', 'first'));
      const fast = engine.handleFrame(state, frame('chat', 'second'));

      const userTurns = store.getSession('s1')?.messages.map(m => m.text);
      expect(userTurns).toEqual(['first', 'second']);

      await flush();
      expect(backend.requests).toHaveLength(1);

      backend.resolveImage(0);
      await slow;
      await flush();
      expect(backend.requests).toHaveLength(2);
      backend.resolve(1, { text: 'Use warm tones' });
      await fast;

      const terminal = connection.frames.filter(f => f.type !== 'status');
      expect(terminal.map(f => [f.type, f.content])).toEqual([
        ['image', 'Image generated.'],
        ['message', 'Use warm tones'],
      ]);

      const log = store.getSession('s1')?.messages ?? [];
      expect(log.map(m => [m.sequence, m.role])).toEqual([
        [1, 'user'],
        [2, 'user'],
        [3, 'assistant'],
        [4, 'assistant'],
      ]);
      expect(backend.maxInFlight).toBe(1);
    });

    test('one session waiting does not hold up another session', async () => {
      const one = openSession('s1');
      const two = openSession('s2', 'banner_web');

      const first = engine.handleFrame(one.state, frame('chat', 'one-a'));
      const queued = engine.handleFrame(one.state, frame('chat', 'one-b'));
      const other = engine.handleFrame(two.state, frame('chat', 'two-a'));
      await flush();

      expect(backend.requests.map(r => r.prompt)).toEqual(['one-a', 'two-a']);
      expect(one.state.pendingGenerations).toBe(2);

      backend.resolve(1, { text: 'reply two' });
      await other;
      expect(two.connection.framesOfType('message').map(f => f.content)).toEqual(['reply two']);
      expect(one.connection.framesOfType('message')).toHaveLength(0);

      backend.resolve(0, { text: 'reply one-a' });
      await first;
      await flush();
      expect(backend.requests.map(r => r.prompt)).toEqual(['one-a', 'two-a', 'one-b']);
      backend.resolve(2, { text: 'reply one-b' });
      await queued;

      expect(one.connection.framesOfType('message').map(f => f.content)).toEqual([
        'reply one-a',
        'reply one-b',
      ]);
    });

    test('later requests see earlier turns in their context', async () => {
      const { state } = openSession('s1');

      const first = engine.handleFrame(state, frame('chat', 'hello'));
      await flush();
      backend.resolve(0, { text: 'hi there' });
      await first;

      const second = engine.handleFrame(state, frame('chat', 'again'));
      await flush();
      expect(backend.requests[1].context).toEqual([
        { role: 'user', text: 'hello' },
        { role: 'assistant', text: 'hi there' },
      ]);
      backend.resolve(1, { text: 'ok' });
      await second;
    });
  });

  describe('disconnects', () => {
    test('a result finished after the client left is still persisted', async () => {
      const { state, connection } = openSession('s1');

      const done = engine.handleFrame(state, frame('generate', 'a mug'));
      await flush();
      connection.open = false;
      state.unbind(connection);

      backend.resolveImage(0);
      await done;

      expect(connection.sent).toHaveLength(1);
      const log = store.getSession('s1')?.messages ?? [];
      expect(log.map(m => m.role)).toEqual(['user', 'assistant']);
      expect(state.lastImage()?.id).toBe(log[1].imageId);
    });

    test('a connection bound mid-generation receives the result', async () => {
      const { state, connection } = openSession('s1');

      const done = engine.handleFrame(state, frame('chat', 'hello'));
      await flush();
      const replacement = new FakeConnection();
      state.bind(replacement);
      connection.open = false;

      backend.resolve(0, { text: 'welcome back' });
      await done;

      expect(connection.frames.map(f => f.type)).toEqual(['status']);
      expect(replacement.frames.map(f => [f.type, f.content])).toEqual([['message', 'welcome back']]);
    });
  });

  describe('rejections', () => {
    test('a malformed frame yields exactly one error and changes nothing', async () => {
      const { state, connection } = openSession('s1');

      await engine.handleFrame(state, '{"type": "chat", ');

      expect(connection.frames).toEqual([
        {
          type: 'error',
          content: 'Parse error: Invalid JSON',
          data: { code: ErrorCodes.PARSE_ERROR, reason: 'ParseError', category: 'validation' },
          timestamp: expect.any(String),
        },
      ]);
      expect(store.getSession('s1')?.messages).toEqual([]);
      expect(state.messageCount).toBe(0);
      expect(backend.calls).toHaveLength(0);
    });

    test('refine on a session without images never reaches the backend', async () => {
      const { state, connection } = openSession('s1');

      await engine.handleFrame(state, frame('refine', 'brighter', { image_id: 'img-unknown' }));

      expect(connection.frames).toHaveLength(1);
      expect(connection.frames[0].content).toBe('No image to refine yet. Generate an image first.');
      expect(dataOf(connection.frames[0]).code).toBe(ErrorCodes.NO_PRIOR_IMAGE);
      expect(store.getSession('s1')?.messages).toHaveLength(0);
      expect(backend.calls).toHaveLength(0);
    });

    test('refine of an image from elsewhere is rejected once an image exists', async () => {
      const { state, connection } = openSession('s1');
      const generated = engine.handleFrame(state, frame('generate', 'a mug'));
      await flush();
      backend.resolveImage(0);
      await generated;

      await engine.handleFrame(state, frame('refine', 'brighter', { image_id: 'img-unknown' }));

      const error = connection.frames[2];
      expect(error.type).toBe('error');
      expect(error.content).toBe('Image not found in this session: img-unknown');
      expect(dataOf(error).code).toBe(ErrorCodes.IMAGE_NOT_FOUND);
      expect(store.getSession('s1')?.messages).toHaveLength(2);
      expect(backend.calls).toHaveLength(1);
    });

    test('sessions that are no longer active reject new turns', async () => {
      const { state, connection } = openSession('s1');
      store.updateSession('s1', { status: 'archived' });

      await engine.handleFrame(state, frame('chat', 'hello'));

      expect(connection.frames[0].content).toBe('Session s1 is archived and no longer accepts messages');
      expect(dataOf(connection.frames[0]).code).toBe(ErrorCodes.SESSION_NOT_ACTIVE);
    });

    test('sessions deleted from the store report not found', async () => {
      const { state, connection } = openSession('s1');
      store.deleteSession('s1');

      await engine.handleFrame(state, frame('chat', 'hello'));

      expect(connection.frames[0].content).toBe('Session not found: s1');
      expect(dataOf(connection.frames[0]).code).toBe(ErrorCodes.SESSION_NOT_FOUND);
    });
  });

  describe('selection', () => {
    test('purpose and style on a request are stored on the session', async () => {
      const { state } = openSession('s1');

      const done = engine.handleFrame(
        state,
        frame('generate', 'spring sale', { purpose: 'banner_web', style: 'vibrant' })
      );
      await flush();

      expect(state.currentPurpose).toBe('banner_web');
      expect(state.currentStyle).toBe('vibrant');
      expect(store.getSessionSummary('s1')).toMatchObject({ purpose: 'banner_web', style: 'vibrant' });
      expect(backend.requests[0]).toMatchObject({
        aspectRatio: '16:9',
        prompt:
          'Image dimensions: 1920x640px. wide banner format, clean layout, brand-focused, text space on sides. spring sale. Style: vibrant colors, energetic mood, bold visual',
      });

      backend.resolveImage(0);
      await done;
    });
  });

  describe('converse', () => {
    test('text with an image becomes a mixed frame', async () => {
      const { state, connection } = openSession('s1');

      const done = engine.handleFrame(state, frame('converse', 'make me a poster'));
      await flush();
      expect(connection.frames[0]).toMatchObject({ content: 'Thinking...', data: { step: 'thinking' } });
      backend.resolveImage(0, 'Here is a poster.');
      await done;

      const result = connection.frames[1];
      expect(result.type).toBe('mixed');
      expect(result.content).toBe('Here is a poster.');
      expect(result.image_url).toBe(`data:image/png;base64,${MOCK_PNG_BASE64}`);
      expect(store.getSession('s1')?.messages[1].contentKind).toBe('mixed');
    });

    test('text only becomes a message frame and passes the latest image along', async () => {
      const { state, connection } = openSession('s1');
      const generated = engine.handleFrame(state, frame('generate', 'a mug'));
      await flush();
      backend.resolveImage(0);
      await generated;

      const done = engine.handleFrame(state, frame('converse', 'what do you think?'));
      await flush();
      expect(backend.requests[1].priorImage?.data.toString('base64')).toBe(MOCK_PNG_BASE64);
      backend.resolve(1, { text: 'Looks great.' });
      await done;

      const result = connection.frames[3];
      expect(result.type).toBe('message');
      expect(result.content).toBe('Looks great.');
      expect(dataOf(result).image_id).toBeUndefined();
    });
  });

  describe('failures', () => {
    test('upstream failures produce one error and keep the session usable', async () => {
      const { state, connection } = openSession('s1');

      const failed = engine.handleFrame(state, frame('generate', 'a mug'));
      await flush();
      backend.reject(0, new GenerationFailure('RateLimited', 'quota exhausted', 'scripted'));
      await failed;

      expect(connection.frames.map(f => f.type)).toEqual(['status', 'error']);
      expect(connection.frames[1].content).toBe('quota exhausted');
      expect(connection.frames[1].data).toEqual({
        code: ErrorCodes.RATE_LIMITED,
        reason: 'RateLimited',
        category: 'upstream',
      });
      expect(store.getSession('s1')?.messages.map(m => m.role)).toEqual(['user']);
      expect(state.isGenerating()).toBe(false);

      const retried = engine.handleFrame(state, frame('chat', 'still there?'));
      await flush();
      backend.resolve(1, { text: 'yes' });
      await retried;
      expect(connection.frames[3]).toMatchObject({ type: 'message', content: 'yes' });
    });

    test('unclassified backend errors are reported as unknown upstream failures', async () => {
      const { state, connection } = openSession('s1');

      const failed = engine.handleFrame(state, frame('chat', 'hello'));
      await flush();
      backend.reject(0, new Error('socket hang up'));
      await failed;

      expect(connection.frames[1].content).toBe('socket hang up');
      expect(dataOf(connection.frames[1]).reason).toBe('Unknown');
    });

    test('a failed user-turn append is reported and nothing is generated', async () => {
      const { state, connection } = openSession('s1');
      jest.spyOn(store, 'appendMessage').mockImplementation(() => {
        throw new SessionStoreError('disk full', 's1');
      });

      await engine.handleFrame(state, frame('chat', 'hello'));

      expect(connection.frames).toHaveLength(1);
      expect(connection.frames[0].content).toBe('Failed to save conversation: disk full');
      expect(connection.frames[0].data).toEqual({
        code: ErrorCodes.PERSISTENCE_FAILURE,
        reason: 'PersistenceFailure',
        category: 'persistence',
      });
      expect(state.messageCount).toBe(0);
      expect(backend.calls).toHaveLength(0);
    });

    test('a failed user-turn append leaves purpose and style unchanged', async () => {
      const { state, connection } = openSession('s1');
      jest.spyOn(store, 'appendMessage').mockImplementation(() => {
        throw new SessionStoreError('disk full', 's1');
      });

      await engine.handleFrame(state, frame('chat', 'hi', { purpose: 'banner_web', style: 'tech' }));

      expect(connection.frames.map(f => dataOf(f).reason)).toEqual(['PersistenceFailure']);
      expect(state.currentPurpose).toBe('product_showcase');
      expect(state.currentStyle).toBeUndefined();
      const session = store.getSessionSummary('s1');
      expect(session?.purpose).toBe('product_showcase');
      expect(session?.style).toBeUndefined();
      expect(backend.calls).toHaveLength(0);
    });

    test('a failed assistant append is reported after the status frame', async () => {
      const { state, connection } = openSession('s1');
      const append = store.appendMessage.bind(store);
      jest.spyOn(store, 'appendMessage').mockImplementation((sessionId, message, image) => {
        if (message.role === 'assistant') {
          throw new SessionStoreError('disk full', sessionId);
        }
        return append(sessionId, message, image);
      });

      const done = engine.handleFrame(state, frame('generate', 'a mug'));
      await flush();
      backend.resolveImage(0);
      await done;

      expect(connection.frames.map(f => f.type)).toEqual(['status', 'error']);
      expect(dataOf(connection.frames[1]).code).toBe(ErrorCodes.PERSISTENCE_FAILURE);
      expect(state.lastImage()).toBeUndefined();
      expect(state.messageCount).toBe(1);
    });
  });
});
