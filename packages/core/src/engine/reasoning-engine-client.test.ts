import { describe, it, expect, vi } from 'vitest';
import { ReadableStream } from 'node:stream/web';
import type { Credential } from '@verity/shared/src/types/credential.types.js';
import {
  ConfigurationError,
  MissingCredentialError,
  TimeoutError,
  TransportError,
} from '@verity/shared/src/utils/errors.js';
import { createInMemoryCredentialStore } from '../credentials/credential-store.js';
import { createReasoningEngineClient, MAX_ERROR_BODY_LENGTH } from './reasoning-engine-client.js';
import type { ReasoningEngineClientConfig } from './reasoning-engine-client.js';

const ENDPOINT = 'https://engine.example.com/v1/reasoningEngines/test:streamQuery';
const NOW = Date.parse('2026-01-01T00:00:00Z');

const encoder = new TextEncoder();

const validCredential: Credential = {
  token: 'test-token',
  expiresAt: new Date(NOW + 3600 * 1000),
};

function fragment(text: string): string {
  return JSON.stringify({ content: { parts: [{ text }] } });
}

function streamingResponse(lines: readonly string[], init?: ResponseInit): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller): void {
      for (const line of lines) {
        controller.enqueue(encoder.encode(`${line}\n`));
      }
      controller.close();
    },
  });
  return new Response(body, init);
}

function createClient(
  fetchFn: typeof fetch,
  overrides: Partial<ReasoningEngineClientConfig> = {},
): ReturnType<typeof createReasoningEngineClient> {
  return createReasoningEngineClient({
    endpointUrl: ENDPOINT,
    credentialStore: createInMemoryCredentialStore(validCredential),
    fetch: fetchFn,
    now: () => NOW,
    ...overrides,
  });
}

function rejectOnAbort(init: RequestInit | undefined, reject: (error: Error) => void): void {
  init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')), {
    once: true,
  });
}

describe('createReasoningEngineClient', () => {
  it('should wrap the final text in the log envelope', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(streamingResponse([fragment('The claim is legitimate.')]));

    const envelope = await createClient(fetchFn).run('Is this true?', 'user-1');

    expect(envelope).toEqual({
      logs: [{ content: { parts: [{ text: 'The claim is legitimate.' }] } }],
    });
  });

  it('should send an authenticated stream query', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(streamingResponse([fragment('ok')]));

    await createClient(fetchFn).run('Is this true?', 'user-1');

    expect(fetchFn).toHaveBeenCalledTimes(1);
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe(ENDPOINT);
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      Authorization: 'Bearer test-token',
      'Content-Type': 'application/json',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      class_method: 'async_stream_query',
      input: { user_id: 'user-1', message: 'Is this true?' },
    });
  });

  it('should use the credential current at call time', async () => {
    const credentialStore = createInMemoryCredentialStore(validCredential);
    const fetchFn = vi.fn<typeof fetch>().mockImplementation(() => Promise.resolve(streamingResponse([fragment('ok')])));
    const client = createClient(fetchFn, { credentialStore });

    await client.run('first', 'user-1');
    credentialStore.replace({ token: 'rotated-token', expiresAt: new Date(NOW + 7200 * 1000) });
    await client.run('second', 'user-1');

    const authHeaders = fetchFn.mock.calls.map(([, init]) => new Headers(init?.headers).get('Authorization'));
    expect(authHeaders).toEqual(['Bearer test-token', 'Bearer rotated-token']);
  });

  it('should return the last text of a multi-fragment stream', async () => {
    const fetchFn = vi
      .fn<typeof fetch>()
      .mockResolvedValue(streamingResponse([fragment('searching'), 'not json', fragment('Final answer')]));

    const envelope = await createClient(fetchFn).run('query', 'user-1');

    expect(envelope.logs?.[0]?.content?.parts?.[0]?.text).toBe('Final answer');
  });

  it('should report discarded lines', async () => {
    const onDiscardedLine = vi.fn();
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(streamingResponse(['garbage', fragment('ok')]));

    await createClient(fetchFn, { onDiscardedLine }).run('query', 'user-1');

    expect(onDiscardedLine).toHaveBeenCalledTimes(1);
    expect(onDiscardedLine).toHaveBeenCalledWith('garbage', expect.any(SyntaxError));
  });

  it('should return an empty answer for an empty body', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(new Response(null, { status: 200 }));

    const envelope = await createClient(fetchFn).run('query', 'user-1');

    expect(envelope).toEqual({ logs: [{ content: { parts: [{ text: '' }] } }] });
  });

  it('should fail without a credential', async () => {
    const fetchFn = vi.fn<typeof fetch>();
    const client = createClient(fetchFn, { credentialStore: createInMemoryCredentialStore() });

    await expect(client.run('query', 'user-1')).rejects.toThrow(MissingCredentialError);
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('should fail with an expired credential', async () => {
    const fetchFn = vi.fn<typeof fetch>();
    const client = createClient(fetchFn, {
      credentialStore: createInMemoryCredentialStore({ token: 'test-token', expiresAt: new Date(NOW - 1) }),
    });

    await expect(client.run('query', 'user-1')).rejects.toThrow(
      'Access token expired at 2025-12-31T23:59:59.999Z',
    );
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('should surface error statuses with a truncated body', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(new Response('x'.repeat(1000), { status: 403 }));

    const error: unknown = await createClient(fetchFn).run('query', 'user-1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    const transportError = error as TransportError;
    expect(transportError.reason).toBe('http_error');
    expect(transportError.status).toBe(403);
    expect(transportError.body).toBe('x'.repeat(MAX_ERROR_BODY_LENGTH));
    expect(transportError.message).toBe('Reasoning engine responded with status 403');
  });

  it('should surface connection failures as transport errors', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));

    const error: unknown = await createClient(fetchFn).run('query', 'user-1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect((error as TransportError).message).toBe('Reasoning engine transport failure: fetch failed');
    expect((error as TransportError).status).toBeUndefined();
  });

  it('should surface a connection reset mid stream as a transport error', async () => {
    let sent = false;
    const body = new ReadableStream<Uint8Array>({
      pull(controller): void {
        if (!sent) {
          sent = true;
          controller.enqueue(encoder.encode(`${fragment('partial answer')}\n`));
          return;
        }
        controller.error(new Error('read ECONNRESET'));
      },
    });
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(new Response(body, { status: 200 }));

    const error: unknown = await createClient(fetchFn).run('query', 'user-1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect((error as TransportError).reason).toBe('http_error');
  });

  it('should time out while waiting for the response', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          rejectOnAbort(init, reject);
        }),
    );

    const error: unknown = await createClient(fetchFn, { timeoutMs: 20 })
      .run('query', 'user-1')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect((error as TimeoutError).reason).toBe('timeout');
    expect((error as TimeoutError).timeoutMs).toBe(20);
  });

  it('should time out while reading the stream', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockImplementation((_input, init) => {
      const body = new ReadableStream<Uint8Array>({
        start(controller): void {
          controller.enqueue(encoder.encode(`${fragment('still thinking')}\n`));
          init?.signal?.addEventListener('abort', () => controller.error(new Error('aborted')), {
            once: true,
          });
        },
      });
      return Promise.resolve(new Response(body, { status: 200 }));
    });

    await expect(createClient(fetchFn, { timeoutMs: 20 }).run('query', 'user-1')).rejects.toThrow(
      TimeoutError,
    );
  });

  it('should time out while reading an error status body', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockImplementation((_input, init) => {
      const body = new ReadableStream<Uint8Array>({
        start(controller): void {
          init?.signal?.addEventListener('abort', () => controller.error(new Error('aborted')), {
            once: true,
          });
        },
      });
      return Promise.resolve(new Response(body, { status: 500 }));
    });

    const error: unknown = await createClient(fetchFn, { timeoutMs: 20 })
      .run('query', 'user-1')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ reason: 'timeout', timeoutMs: 20 });
  });

  it('should stop reading an error body once enough text is collected', async () => {
    let chunksSent = 0;
    let cancelled = false;
    const body = new ReadableStream<Uint8Array>({
      pull(controller): void {
        chunksSent++;
        controller.enqueue(encoder.encode('y'.repeat(100)));
      },
      cancel(): void {
        cancelled = true;
      },
    });
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(new Response(body, { status: 502 }));

    const error: unknown = await createClient(fetchFn).run('query', 'user-1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ status: 502, body: 'y'.repeat(MAX_ERROR_BODY_LENGTH) });
    expect(cancelled).toBe(true);
    expect(chunksSent).toBeLessThan(10);
  });

  it('should reject a non-positive timeout', () => {
    expect(() => createClient(vi.fn<typeof fetch>(), { timeoutMs: 0 })).toThrow(ConfigurationError);
  });
});
