/**
 * Application loop unit tests
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Application } from '../../../src/core/Application.js';
import { ConfigManager } from '../../../src/config/ConfigManager.js';
import type { ReconcileOutcome } from '../../../src/types/index.js';

const unchanged: ReconcileOutcome = { action: 'unchanged', hostname: 'home.example.com', ip: '203.0.113.7' };

function createConfig(extra: Record<string, string> = {}): ConfigManager {
  return new ConfigManager({
    env: { USERNAME: 'alice', TOKEN: 'test-token', HOST: 'home', DOMAIN: 'example.com', ...extra },
    secretsDir: '/nonexistent',
  });
}

describe('Application', () => {
  describe('tick loop', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should run a tick immediately, then one per interval', async () => {
      const reconcileOnce = vi.fn().mockResolvedValue(unchanged);
      const app = new Application({ config: createConfig(), reconciler: { reconcileOnce } });

      const done = app.start();
      await vi.advanceTimersByTimeAsync(0);
      expect(reconcileOnce).toHaveBeenCalledTimes(1);
      expect(app.running).toBe(true);

      await vi.advanceTimersByTimeAsync(9999);
      expect(reconcileOnce).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      expect(reconcileOnce).toHaveBeenCalledTimes(2);

      app.stop();
      await done;

      expect(app.running).toBe(false);
      expect(app.ticks).toBe(2);
    });

    it('should wait for a slow tick before sleeping', async () => {
      let finishTick: (outcome: ReconcileOutcome) => void = () => undefined;
      const reconcileOnce = vi
        .fn()
        .mockImplementationOnce(() => new Promise<ReconcileOutcome>((resolve) => { finishTick = resolve; }))
        .mockResolvedValue(unchanged);
      const app = new Application({ config: createConfig(), reconciler: { reconcileOnce } });

      const done = app.start();
      await vi.advanceTimersByTimeAsync(30000);
      expect(reconcileOnce).toHaveBeenCalledTimes(1);

      finishTick(unchanged);
      await vi.advanceTimersByTimeAsync(9999);
      expect(reconcileOnce).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      expect(reconcileOnce).toHaveBeenCalledTimes(2);

      app.stop();
      await done;
    });

    it('should honour a configured interval', async () => {
      const reconcileOnce = vi.fn().mockResolvedValue(unchanged);
      const app = new Application({ config: createConfig({ UPDATE_INTERVAL: '60000' }), reconciler: { reconcileOnce } });

      const done = app.start();
      await vi.advanceTimersByTimeAsync(59999);
      expect(reconcileOnce).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      expect(reconcileOnce).toHaveBeenCalledTimes(2);

      app.stop();
      await done;
    });

    it('should exit without sleeping when stopped during a tick', async () => {
      const app: Application = new Application({
        config: createConfig(),
        reconciler: {
          reconcileOnce: () => {
            app.stop();
            return Promise.resolve(unchanged);
          },
        },
      });

      await app.start();

      expect(app.ticks).toBe(1);
      expect(app.running).toBe(false);
    });
  });

  describe('wiring', () => {
    afterEach(() => {
      vi.unstubAllGlobals();
    });

    it('should reconcile against the configured endpoints', async () => {
      const app = new Application({
        config: createConfig({
          NAMECOM_API_URL: 'https://api.dev.name.com',
          IP_LOOKUP_URL: 'https://ip.example.test/',
        }),
      });

      const mockFetch = vi
        .fn()
        .mockResolvedValueOnce({ status: 200, text: () => Promise.resolve('{"records":[]}') })
        .mockResolvedValueOnce({ status: 200, text: () => Promise.resolve('203.0.113.7') })
        .mockImplementationOnce(() => {
          app.stop();
          return Promise.resolve({
            status: 200,
            text: () => Promise.resolve('{"id":1,"host":"home","type":"A","answer":"203.0.113.7","ttl":300}'),
          });
        });
      vi.stubGlobal('fetch', mockFetch);

      await app.start();

      expect(mockFetch.mock.calls.map((call) => [call[0], call[1]?.method])).toEqual([
        ['https://api.dev.name.com/v4/domains/example.com/records', undefined],
        ['https://ip.example.test/', undefined],
        ['https://api.dev.name.com/v4/domains/example.com/records', 'POST'],
      ]);
      expect(mockFetch.mock.calls[2]![1].body).toBe('{"host":"home","type":"A","answer":"203.0.113.7","ttl":300}');
    });
  });
});
