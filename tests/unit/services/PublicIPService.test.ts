import { describe, it, expect, vi, beforeEach, afterAll } from 'vitest';
import { PublicIPService } from '../../../src/services/PublicIPService.js';
import { IPLookupError } from '../../../src/core/errors.js';

const mockFetch = vi.fn();

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);
});

afterAll(() => {
  vi.unstubAllGlobals();
});

describe('PublicIPService', () => {
  it('returns the body verbatim', async () => {
    mockFetch.mockResolvedValueOnce({ status: 200, text: () => Promise.resolve('203.0.113.7') });

    const service = new PublicIPService();

    await expect(service.lookup()).resolves.toBe('203.0.113.7');
    expect(mockFetch.mock.calls[0]![0]).toBe('https://api.ipify.org?format=text');
  });

  it('does not validate the address format', async () => {
    mockFetch.mockResolvedValueOnce({ status: 200, text: () => Promise.resolve('not-an-ip\n') });

    await expect(new PublicIPService().lookup()).resolves.toBe('not-an-ip\n');
  });

  it('uses a configured endpoint', async () => {
    mockFetch.mockResolvedValueOnce({ status: 200, text: () => Promise.resolve('198.51.100.4') });

    await new PublicIPService({ url: 'https://ip.example.test/' }).lookup();

    expect(mockFetch.mock.calls[0]![0]).toBe('https://ip.example.test/');
  });

  it('rejects with IPLookupError on a non-200 status', async () => {
    mockFetch.mockResolvedValueOnce({ status: 503, text: () => Promise.resolve('busy') });

    const error = await new PublicIPService().lookup().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IPLookupError);
    expect(error).toMatchObject({
      status: 503,
      message: 'unexpected status code 503 while looking up own ip: busy',
    });
  });

  it('rejects with IPLookupError on a transport failure', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(new PublicIPService().lookup()).rejects.toThrow(
      'error while querying https://api.ipify.org?format=text to lookup own ip: fetch failed'
    );
  });
});
