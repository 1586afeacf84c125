import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  AuthenticationError,
  Faunavox,
  InvalidRequestError,
  NotFoundError,
  PermissionDeniedError,
  ServiceUnavailableError,
  TimeoutError,
} from './index.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

const REPORT = {
  artifact_id: 'art_1',
  job_id: 'job_1',
  status: 'succeeded',
  attempts: 1,
  quality: null,
  result: null,
  error: null,
  finalized_at: '2026-01-05T10:00:00.000Z',
};

describe('Faunavox', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
  });

  it('lists species without a caller id', async () => {
    const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({
        species: [{ id: 'corvus_brachyrhynchos', common_name: 'American crow', default_tags: ['alarm_call'] }],
        count: 1,
      }),
    );
    const sdk = new Faunavox({ baseUrl: 'http://faunavox.test/' });

    const listed = await sdk.species.list();

    expect(listed.count).toBe(1);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe('http://faunavox.test/v1/species');
  });

  it('uploads raw audio with query metadata and identity headers', async () => {
    const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse({ id: 'art_1' }, 201));
    const sdk = new Faunavox({ baseUrl: 'http://faunavox.test', callerId: 'caller-1', apiKey: 'test-secret' });
    const audio = new Uint8Array([1, 2, 3]);

    await sdk.artifacts.upload({ audio, species: 'canis_lupus', format: 'wav', location: 'ridge 4' });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://faunavox.test/v1/artifacts?species=canis_lupus&format=wav&location=ridge+4');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(audio);
    expect(init?.headers).toMatchObject({
      'Content-Type': 'audio/wav',
      'x-caller-id': 'caller-1',
      'x-api-key': 'test-secret',
    });
  });

  it('wraps a finished report as ready', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse(REPORT));
    const sdk = new Faunavox({ callerId: 'caller-1' });

    const lookup = await sdk.analysis.result('art_1');

    expect(lookup).toEqual({ state: 'ready', report: REPORT });
  });

  it('passes a pending lookup through', async () => {
    const pending = { artifact_id: 'art_1', state: 'not_ready', status: 'dispatched', job_id: 'job_1' };
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse(pending, 202));
    const sdk = new Faunavox({ callerId: 'caller-1' });

    const lookup = await sdk.analysis.result('art_1');

    expect(lookup).toEqual(pending);
  });

  it('polls until the report is ready', async () => {
    const fetchMock = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValueOnce(
        jsonResponse({ artifact_id: 'art_1', state: 'not_ready', status: 'dispatched', job_id: 'job_1' }, 202),
      )
      .mockResolvedValueOnce(jsonResponse(REPORT));
    const sdk = new Faunavox({ callerId: 'caller-1' });

    const report = await sdk.analysis.waitForResult('art_1', { intervalMs: 1 });

    expect(report.status).toBe('succeeded');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('skips the report of an earlier job when waiting for a new one', async () => {
    const earlier = { ...REPORT, job_id: 'job_0', status: 'rejected' };
    const fetchMock = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValueOnce(jsonResponse(earlier))
      .mockResolvedValueOnce(jsonResponse(earlier))
      .mockResolvedValueOnce(jsonResponse(REPORT));
    const sdk = new Faunavox({ callerId: 'caller-1' });

    const report = await sdk.analysis.waitForResult('art_1', { intervalMs: 1, jobId: 'job_1' });

    expect(report.job_id).toBe('job_1');
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('gives up waiting once the timeout would pass', async () => {
    vi.spyOn(globalThis, 'fetch').mockImplementation(async () =>
      jsonResponse({ artifact_id: 'art_1', state: 'not_ready', status: 'dispatched', job_id: 'job_1' }, 202),
    );
    const sdk = new Faunavox({ callerId: 'caller-1' });

    await expect(sdk.analysis.waitForResult('art_1', { intervalMs: 50, timeoutMs: 10 })).rejects.toBeInstanceOf(
      TimeoutError,
    );
  });

  it('maps error envelopes onto typed errors', async () => {
    const sdk = new Faunavox({ callerId: 'caller-1' });
    const fetchMock = vi.spyOn(globalThis, 'fetch');

    fetchMock.mockResolvedValueOnce(jsonResponse({ error: { code: 'UNAUTHORIZED', message: 'no caller' } }, 401));
    await expect(sdk.jobs.retrieve('job_1')).rejects.toBeInstanceOf(AuthenticationError);

    fetchMock.mockResolvedValueOnce(jsonResponse({ error: { code: 'FORBIDDEN', message: 'not yours' } }, 403));
    await expect(sdk.jobs.retrieve('job_1')).rejects.toBeInstanceOf(PermissionDeniedError);

    fetchMock.mockResolvedValueOnce(jsonResponse({ error: { code: 'NOT_FOUND', message: 'gone' } }, 404));
    await expect(sdk.jobs.cancel('job_1')).rejects.toBeInstanceOf(NotFoundError);

    fetchMock.mockResolvedValueOnce(
      jsonResponse({ error: { code: 'STORAGE_UNAVAILABLE', message: 'bucket down' } }, 503),
    );
    await expect(sdk.analysis.trigger('art_1')).rejects.toBeInstanceOf(ServiceUnavailableError);
  });

  it('keeps the status and code of validation failures', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse(
        {
          error: {
            code: 'UNSUPPORTED_FORMAT',
            message: "Audio format 'ogg' is not supported",
            details: { format: 'ogg' },
          },
        },
        415,
      ),
    );
    const sdk = new Faunavox({ callerId: 'caller-1' });

    const error = await sdk.artifacts
      .upload({ audio: new Uint8Array([1]), species: 'canis_lupus', format: 'wav' })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(InvalidRequestError);
    expect(error).toMatchObject({ code: 'UNSUPPORTED_FORMAT', statusCode: 415, details: { format: 'ogg' } });
  });
});
