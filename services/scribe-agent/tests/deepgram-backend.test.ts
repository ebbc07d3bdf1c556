import { describe, expect, it, vi } from 'vitest';
import { DeepgramBackend, getDeepgramListenUrl } from '../src/transcription/deepgram-backend.js';
import { PermanentBackendError, TransientBackendError } from '../src/errors.js';
import { makeUtterance } from './helpers.js';

function listenResponse(transcript: string): Response {
  return new Response(
    JSON.stringify({ results: { channels: [{ alternatives: [{ transcript, confidence: 0.98 }] }] } }),
    { status: 200, headers: { 'Content-Type': 'application/json' } }
  );
}

function transcribeWith(fetchMock: typeof fetch): Promise<string> {
  const backend = new DeepgramBackend({ apiKey: 'test-secret', fetch: fetchMock });
  return backend.transcribe(makeUtterance('alice', 0), { signal: new AbortController().signal });
}

describe('getDeepgramListenUrl', () => {
  it('builds the pre-recorded listen URL', () => {
    expect(getDeepgramListenUrl()).toBe(
      'https://api.deepgram.com/v1/listen?model=nova-3&language=en&punctuate=true&smart_format=true'
    );
    expect(getDeepgramListenUrl('nova-2', 'de')).toBe(
      'https://api.deepgram.com/v1/listen?model=nova-2&language=de&punctuate=true&smart_format=true'
    );
  });
});

describe('DeepgramBackend', () => {
  it('posts WAV audio with the API token and returns the transcript', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(listenResponse(' Hi everyone. '));

    await expect(transcribeWith(fetchMock)).resolves.toBe('Hi everyone.');

    expect(fetchMock).toHaveBeenCalledWith(
      getDeepgramListenUrl(),
      expect.objectContaining({
        method: 'POST',
        headers: {
          'Authorization': 'Token test-secret',
          'Content-Type': 'audio/wav',
        },
      })
    );
  });

  it('retries server errors', async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValue(new Response('busy', { status: 503, statusText: 'Service Unavailable' }));

    const error = await transcribeWith(fetchMock).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientBackendError);
    expect(error).toHaveProperty('message', '[deepgram] 503 Service Unavailable: busy');
  });

  it('does not retry a rejected payload', async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValue(new Response('corrupt audio', { status: 400, statusText: 'Bad Request' }));

    await expect(transcribeWith(fetchMock)).rejects.toBeInstanceOf(PermanentBackendError);
  });

  it('retries network failures', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));

    await expect(transcribeWith(fetchMock)).rejects.toThrow(
      new TransientBackendError('deepgram', 'fetch failed')
    );
  });

  it('fails permanently on a response without a transcript', async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValue(new Response(JSON.stringify({ results: { channels: [] } }), { status: 200 }));

    await expect(transcribeWith(fetchMock)).rejects.toThrow('[deepgram] Response has no transcript');
  });

  it('fails permanently on an unreadable body', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('<html>', { status: 200 }));

    await expect(transcribeWith(fetchMock)).rejects.toBeInstanceOf(PermanentBackendError);
  });
});
