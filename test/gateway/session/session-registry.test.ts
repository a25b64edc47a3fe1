import { SessionRegistry, toContextTurn } from '../../../src/gateway/session/session-registry.js';
import { InMemorySessionStore } from '../../../src/infra/persistence/in-memory-session-store.js';
import { FakeConnection } from '../../helpers/fake-connection.js';

describe('SessionRegistry', () => {
  let store: InMemorySessionStore;
  let registry: SessionRegistry;

  beforeEach(() => {
    store = new InMemorySessionStore();
    registry = new SessionRegistry(store, { contextWindow: 4 });
  });

  test('returns null for unknown sessions', () => {
    expect(registry.acquire('missing')).toBeNull();
    expect(registry.size).toBe(0);
  });

  test('returns one state per session id', () => {
    store.createSession({ id: 's1', purpose: 'banner_web' });

    const first = registry.acquire('s1');
    const second = registry.acquire('s1');

    expect(first).not.toBeNull();
    expect(second).toBe(first);
    expect(registry.has('s1')).toBe(true);
    expect(registry.size).toBe(1);
  });

  test('rebuilds selection, latest image and context from the store', () => {
    store.createSession({ id: 's1', purpose: 'product_showcase', style: 'minimal' });
    store.appendMessage('s1', { role: 'user', contentKind: 'text', text: 'a mug', tokensUsed: 0 });
    store.appendMessage(
      's1',
      { role: 'assistant', contentKind: 'image', tokensUsed: 5 },
      {
        id: 'img-1',
        mimeType: 'image/png',
        base64: 'AAAA',
        width: 1000,
        height: 1000,
        promptUsed: 'a mug',
        modelUsed: 'mock-image',
        purpose: 'product_showcase',
      }
    );

    const state = registry.acquire('s1');

    expect(state?.currentPurpose).toBe('product_showcase');
    expect(state?.currentStyle).toBe('minimal');
    expect(state?.lastImage()?.id).toBe('img-1');
    expect(state?.messageCount).toBe(2);
    expect(state?.contextWindow()).toEqual([
      { role: 'user', text: 'a mug' },
      { role: 'assistant', text: '[image img-1]' },
    ]);
  });

  test('forget drops the cached state', () => {
    store.createSession({ id: 's1', purpose: 'custom' });
    const first = registry.acquire('s1');

    expect(registry.forget('s1')).toBe(true);
    expect(registry.acquire('s1')).not.toBe(first);
  });

  describe('sweep', () => {
    test('evicts unbound idle states only', () => {
      store.createSession({ id: 'idle', purpose: 'custom' });
      store.createSession({ id: 'bound', purpose: 'custom' });
      store.createSession({ id: 'fresh', purpose: 'custom' });

      const now = Date.now();
      registry.acquire('idle');
      registry.acquire('bound')?.bind(new FakeConnection());
      registry.acquire('fresh');

      expect(registry.sweep(1000, now + 2000)).toBe(2);
      expect(registry.has('idle')).toBe(false);
      expect(registry.has('fresh')).toBe(false);
      expect(registry.has('bound')).toBe(true);
    });

    test('keeps states with pending generations', async () => {
      store.createSession({ id: 's1', purpose: 'custom' });
      const state = registry.acquire('s1');
      let release: () => void = () => {};
      const gate = new Promise<void>(resolve => {
        release = resolve;
      });
      const running = state?.withGenerationLock(() => gate);

      expect(registry.sweep(0, Date.now() + 10_000)).toBe(0);

      release();
      await running;
      expect(registry.sweep(0, Date.now() + 10_000)).toBe(1);
    });
  });
});

describe('toContextTurn', () => {
  const base = { id: 'm', sessionId: 's', sequence: 1, contentKind: 'text' as const, tokensUsed: 0, createdAt: 0 };

  test('uses the text when present', () => {
    expect(toContextTurn({ ...base, role: 'user', text: 'hello' })).toEqual({ role: 'user', text: 'hello' });
  });

  test('refers to the image of image-only messages', () => {
    expect(toContextTurn({ ...base, role: 'assistant', text: ' ', imageId: 'img-9' })).toEqual({
      role: 'assistant',
      text: '[image img-9]',
    });
  });

  test('skips empty messages', () => {
    expect(toContextTurn({ ...base, role: 'assistant' })).toBeNull();
  });
});
