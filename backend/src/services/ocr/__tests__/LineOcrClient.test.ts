import { describe, it, expect } from 'vitest';
import { LineOcrClient } from '../LineOcrClient';
import {
  AuthenticationError,
  ProcessingError,
  RateLimitError,
  TimeoutError,
  TransportError,
  ValidationError,
} from '../errors';
import { createFakeFetch, createHangingFetch, type FakeResponse } from './fakes';

const BASE_URL = 'https://ocr.test/api/v1';
const SUBMIT_KEY = `POST ${BASE_URL}/ocr`;
const CHECK_URL = `${BASE_URL}/ocr/req-1`;
const POLL_KEY = `GET ${CHECK_URL}`;

const PDF = {
  content: new Uint8Array([37, 80, 68, 70]),
  filename: 'license.pdf',
  mimeType: 'application/pdf',
};

const ACCEPTED = { success: true, request_id: 'req-1', request_check_url: CHECK_URL };

function clientWith(routes: Record<string, FakeResponse[]>) {
  const fake = createFakeFetch(routes);
  const client = new LineOcrClient({ apiKey: 'test-secret', baseUrl: `${BASE_URL}/`, fetchImpl: fake.fetchImpl });
  return { client, calls: fake.calls };
}

describe('LineOcrClient', () => {
  describe('construction and validation', () => {
    it('should require an API key', () => {
      expect(() => new LineOcrClient({ apiKey: '', baseUrl: BASE_URL })).toThrow(AuthenticationError);
    });

    it('should reject empty files before any request', () => {
      const { client, calls } = clientWith({});
      expect(() => client.validate({ ...PDF, content: new Uint8Array() })).toThrow('File size must be greater than 0');
      expect(calls).toHaveLength(0);
    });

    it('should reject files above the size ceiling', () => {
      const fake = createFakeFetch({});
      const client = new LineOcrClient({
        apiKey: 'test-secret',
        baseUrl: BASE_URL,
        maxFileSizeBytes: 3,
        fetchImpl: fake.fetchImpl,
      });
      expect(() => client.validate(PDF)).toThrow('File size 4 exceeds maximum 3');
    });

    it('should reject unsupported MIME types', () => {
      const { client } = clientWith({});
      expect(() => client.validate({ ...PDF, mimeType: 'text/html' })).toThrow(ValidationError);
    });

    it('should reject more than four language hints', () => {
      const { client } = clientWith({});
      expect(() => client.validate(PDF, { languages: ['en', 'es', 'fr', 'de', 'it'] })).toThrow(
        'Maximum 4 languages allowed'
      );
    });
  });

  describe('submit', () => {
    it('should post the file with the API key header and return a job handle', async () => {
      const { client, calls } = clientWith({ [SUBMIT_KEY]: [{ body: ACCEPTED }] });

      const handle = await client.submit(PDF, { languages: ['en', 'es'], maxPages: 2 });

      expect(handle.requestId).toBe('req-1');
      expect(handle.checkUrl).toBe(CHECK_URL);
      expect(handle.provider).toBe('line-ocr');
      expect(calls).toHaveLength(1);
      expect(calls[0].url).toBe(`${BASE_URL}/ocr`);
      expect(calls[0].init?.headers).toEqual({ 'X-Api-Key': 'test-secret' });

      const form = calls[0].init?.body;
      expect(form).toBeInstanceOf(FormData);
      if (form instanceof FormData) {
        expect(form.get('langs')).toBe('en,es');
        expect(form.get('max_pages')).toBe('2');
        expect(form.has('file')).toBe(true);
      }
    });

    it('should map 401 to AuthenticationError', async () => {
      const { client } = clientWith({ [SUBMIT_KEY]: [{ status: 401, body: { error: 'bad key' } }] });
      await expect(client.submit(PDF)).rejects.toBeInstanceOf(AuthenticationError);
    });

    it('should map 429 to RateLimitError', async () => {
      const { client } = clientWith({ [SUBMIT_KEY]: [{ status: 429 }] });
      await expect(client.submit(PDF)).rejects.toBeInstanceOf(RateLimitError);
    });

    it('should map other error statuses to ProcessingError with the provider message', async () => {
      const { client } = clientWith({ [SUBMIT_KEY]: [{ status: 500, body: { error: 'boom' } }] });
      await expect(client.submit(PDF)).rejects.toThrow('Request failed: boom');
    });

    it('should treat success=false as a processing failure', async () => {
      const { client } = clientWith({ [SUBMIT_KEY]: [{ body: { success: false, error: 'quota' } }] });
      await expect(client.submit(PDF)).rejects.toThrow('OCR submission failed: quota');
    });

    it('should fail when no check URL comes back', async () => {
      const { client } = clientWith({ [SUBMIT_KEY]: [{ body: { success: true, request_id: 'req-1' } }] });
      await expect(client.submit(PDF)).rejects.toThrow('No check URL received from API');
    });

    it('should map network failures to TransportError', async () => {
      const { client } = clientWith({ [SUBMIT_KEY]: [{ networkError: 'fetch failed' }] });
      await expect(client.submit(PDF)).rejects.toBeInstanceOf(TransportError);
    });
  });

  describe('poll', () => {
    const handle = { provider: 'line-ocr', requestId: 'req-1', checkUrl: CHECK_URL, submittedAt: Date.now() };

    it('should report processing jobs', async () => {
      const { client } = clientWith({ [POLL_KEY]: [{ body: { status: 'processing' } }] });
      await expect(client.poll(handle)).resolves.toEqual({ status: 'processing' });
    });

    it('should normalize completed pages into a recognition result', async () => {
      const { client } = clientWith({
        [POLL_KEY]: [
          {
            body: {
              status: 'complete',
              success: true,
              page_count: 2,
              pages: [
                {
                  page: 1,
                  text_lines: [
                    { text: '  NAME: JOHN SMITH ', confidence: 0.9, bbox: [0, 0, 100, 10] },
                    { text: '   ', confidence: 0.1, bbox: [0, 12, 100, 20] },
                    { text: 'EXP: 12/25/2030', confidence: 0.7, bbox: [0, 22, 100, 30] },
                  ],
                },
                { page: 2, text_lines: [{ text: 'CLASS: A', confidence: 0.8, bbox: [0, 0, 50, 10] }] },
              ],
            },
          },
        ],
      });

      const outcome = await client.poll(handle);

      expect(outcome.status).toBe('complete');
      if (outcome.status !== 'complete') return;
      const { result } = outcome;

      expect(result.providerName).toBe('line-ocr');
      expect(result.confidenceSource).toBe('reported');
      expect(result.pageCount).toBe(2);
      expect(result.fullText).toBe('NAME: JOHN SMITH\nEXP: 12/25/2030\n\nCLASS: A');
      expect(result.pages[0].lines).toHaveLength(2);
      expect(result.pages[0].averageConfidence).toBeCloseTo(0.8, 10);
      expect(result.averageConfidence).toBeCloseTo(0.8, 10);
      expect(result.pages[0].lines[0].polygon).toEqual([
        [0, 0],
        [100, 0],
        [100, 10],
        [0, 10],
      ]);
      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.pages[0].lines)).toBe(true);
    });

    it('should report zero confidence when the document has no lines', async () => {
      const { client } = clientWith({
        [POLL_KEY]: [{ body: { status: 'complete', success: true, pages: [{ page: 1, text_lines: [] }] } }],
      });

      const outcome = await client.poll(handle);
      expect(outcome.status === 'complete' && outcome.result.averageConfidence).toBe(0);
      expect(outcome.status === 'complete' && outcome.result.fullText).toBe('');
    });

    it('should fail completed jobs that report success=false', async () => {
      const { client } = clientWith({
        [POLL_KEY]: [{ body: { status: 'complete', success: false, error: 'unreadable' } }],
      });
      await expect(client.poll(handle)).rejects.toThrow('OCR processing failed: unreadable');
    });

    it('should fail on unexpected statuses', async () => {
      const { client } = clientWith({ [POLL_KEY]: [{ body: { status: 'failed' } }] });
      const error = await client.poll(handle).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(ProcessingError);
      expect(error instanceof Error && error.message).toBe('Unexpected status: failed');
    });

    it('should reject malformed poll bodies', async () => {
      const { client } = clientWith({ [POLL_KEY]: [{ body: { pages: [] } }] });
      await expect(client.poll(handle)).rejects.toThrow('Malformed poll response');
    });
  });

  describe('cancellation', () => {
    const handle = { provider: 'line-ocr', requestId: 'req-1', checkUrl: CHECK_URL, submittedAt: Date.now() };

    it('should abort a request that outlives the request timeout', async () => {
      const hanging = createHangingFetch();
      const client = new LineOcrClient({
        apiKey: 'test-secret',
        baseUrl: BASE_URL,
        requestTimeoutMs: 20,
        fetchImpl: hanging.fetchImpl,
      });

      const error = await client.submit(PDF).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TimeoutError);
      expect(error instanceof Error && error.message).toBe('Request timed out after 20ms');
      expect(hanging.aborts()).toBe(1);
    });

    it('should cancel an in-flight poll when the caller aborts', async () => {
      const hanging = createHangingFetch();
      const client = new LineOcrClient({
        apiKey: 'test-secret',
        baseUrl: BASE_URL,
        requestTimeoutMs: 60_000,
        fetchImpl: hanging.fetchImpl,
      });
      const deadline = new AbortController();

      const pending = client.poll(handle, { signal: deadline.signal }).catch((err: unknown) => err);
      deadline.abort();
      const error = await pending;

      expect(error).toBeInstanceOf(TimeoutError);
      expect(error instanceof Error && error.message).toBe('Request cancelled: deadline exceeded');
      expect(hanging.calls).toHaveLength(1);
      expect(hanging.aborts()).toBe(1);
    });

    it('should not send a request once the deadline has passed', async () => {
      const hanging = createHangingFetch();
      const client = new LineOcrClient({ apiKey: 'test-secret', baseUrl: BASE_URL, fetchImpl: hanging.fetchImpl });
      const deadline = new AbortController();
      deadline.abort();

      await expect(client.submit(PDF, { signal: deadline.signal })).rejects.toBeInstanceOf(TimeoutError);
      expect(hanging.calls).toHaveLength(0);
    });
  });
});
