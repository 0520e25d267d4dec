import { describe, it, expect, vi } from 'vitest';
import { JobPoller, nextInterval, DEFAULT_POLLER_CONFIG } from '../JobPoller';
import { ProcessingError, TimeoutError, TransportError } from '../errors';
import { StubProvider, makeResult } from './fakes';

const FILE = { content: new Uint8Array([1]), filename: 'scan.png', mimeType: 'image/png' };

function sequence(...steps: Array<ReturnType<typeof makeResult> | Error | 'processing'>) {
  let index = 0;
  return () => steps[Math.min(index++, steps.length - 1)];
}

describe('JobPoller', () => {
  it('should grow the interval geometrically up to the cap', () => {
    const config = { ...DEFAULT_POLLER_CONFIG, backoffMultiplier: 1.5, maxIntervalMs: 10000 };
    expect(nextInterval(2000, config)).toBe(3000);
    expect(nextInterval(8000, config)).toBe(10000);
  });

  it('should sleep between processing polls with backoff', async () => {
    const result = makeResult('stub', [0.9]);
    const provider = new StubProvider('stub', sequence('processing', 'processing', 'processing', result));
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => undefined);
    const poller = new JobPoller({ pollIntervalMs: 100, backoffMultiplier: 2, maxIntervalMs: 300 }, sleep);

    const outcome = await poller.run(provider, FILE);

    expect(outcome).toBe(result);
    expect(provider.pollCount).toBe(4);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200, 300]);
  });

  it('should time out after the poll ceiling', async () => {
    const provider = new StubProvider('stub', () => 'processing');
    const sleep = vi.fn(async () => undefined);
    const poller = new JobPoller({ maxPolls: 3, pollIntervalMs: 10 }, sleep);

    await expect(poller.run(provider, FILE)).rejects.toThrow('OCR processing timed out after 3 polling attempts');
    expect(provider.pollCount).toBe(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('should retry transport failures within the poll budget', async () => {
    const result = makeResult('stub', [0.7]);
    const provider = new StubProvider('stub', sequence(new TransportError('Network error: reset', 'stub'), result));
    const poller = new JobPoller({ pollIntervalMs: 1 }, async () => undefined);

    await expect(poller.run(provider, FILE)).resolves.toBe(result);
    expect(provider.pollCount).toBe(2);
  });

  it('should stop at the first processing error', async () => {
    const provider = new StubProvider('stub', sequence(new ProcessingError('OCR processing failed: bad scan', 'stub')));
    const poller = new JobPoller({ pollIntervalMs: 1 }, async () => undefined);

    await expect(poller.run(provider, FILE)).rejects.toBeInstanceOf(ProcessingError);
    expect(provider.pollCount).toBe(1);
  });

  it('should surface an aborted signal as a timeout', async () => {
    const provider = new StubProvider('stub', () => 'processing');
    const controller = new AbortController();
    controller.abort();
    const poller = new JobPoller({}, async () => undefined);

    await expect(poller.run(provider, FILE, { signal: controller.signal })).rejects.toBeInstanceOf(TimeoutError);
    expect(provider.pollCount).toBe(0);
  });
});
