/**
 * Main Application Orchestrator
 * Wires the provider, IP service and reconciler, then runs ticks on a fixed interval
 */
import { logger, symbols } from './Logger.js';
import { ConfigManager, getConfig } from '../config/ConfigManager.js';
import { fqdn } from '../config/schema.js';
import { NameComProvider } from '../providers/namecom/NameComProvider.js';
import { PublicIPService } from '../services/PublicIPService.js';
import { DDNSReconciler } from '../services/DDNSReconciler.js';
import type { ReconcileOutcome } from '../types/index.js';

export interface Reconciler {
  reconcileOnce(): Promise<ReconcileOutcome>;
}

export interface ApplicationOptions {
  config?: ConfigManager;
  reconciler?: Reconciler;
  /** Install SIGINT/SIGTERM and crash handlers */
  handleSignals?: boolean;
}

export class Application {
  private config: ConfigManager;
  private reconciler: Reconciler;
  private isRunning: boolean = false;
  private stopRequested: boolean = false;
  private sleepTimer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;
  private tickCount: number = 0;

  constructor(private options: ApplicationOptions = {}) {
    this.config = options.config ?? getConfig();
    this.reconciler = options.reconciler ?? this.createReconciler();
  }

  private createReconciler(): DDNSReconciler {
    const { username, token, host, domain } = this.config.ddns;
    const { apiUrl, ipLookupUrl, requestTimeout } = this.config.app;

    const provider = new NameComProvider({ username, token, domain }, { apiUrl, requestTimeout });
    const ipService = new PublicIPService({ url: ipLookupUrl, requestTimeout });

    return new DDNSReconciler({ host, domain }, provider, ipService);
  }

  /**
   * Run ticks until stop() is called. Resolves once the loop has exited.
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn('Application already running');
      return;
    }

    if (this.options.handleSignals) {
      this.setupShutdownHandlers();
    }

    const { host, domain } = this.config.ddns;
    const interval = this.config.app.updateInterval;

    this.isRunning = true;
    this.stopRequested = false;
    logger.info({ hostname: fqdn(host, domain), interval }, `${symbols.startup} DDNS updater started`);

    try {
      while (!this.stopRequested) {
        this.tickCount++;
        const outcome = await this.reconciler.reconcileOnce();
        logger.debug({ tick: this.tickCount, action: outcome.action }, 'Tick finished');

        if (this.stopRequested) break;
        await this.sleep(interval);
      }
    } finally {
      this.isRunning = false;
    }

    logger.info({ ticks: this.tickCount }, 'DDNS updater stopped');
  }

  /**
   * Ask the loop to exit. A tick in flight runs to completion; a pending sleep ends now.
   */
  stop(): void {
    this.stopRequested = true;
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = null;
    }
    this.wake?.();
    this.wake = null;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wake = resolve;
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = null;
        this.wake = null;
        resolve();
      }, ms);
    });
  }

  private setupShutdownHandlers(): void {
    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Shutdown signal received');
      this.stop();
    };

    process.once('SIGTERM', () => shutdown('SIGTERM'));
    process.once('SIGINT', () => shutdown('SIGINT'));

    process.on('uncaughtException', (error) => {
      logger.fatal({ error }, 'Uncaught exception');
      process.exit(1);
    });

    process.on('unhandledRejection', (reason) => {
      logger.fatal({ reason }, 'Unhandled rejection');
      process.exit(1);
    });
  }

  get running(): boolean {
    return this.isRunning;
  }

  get ticks(): number {
    return this.tickCount;
  }
}

export function createApplication(options?: ApplicationOptions): Application {
  return new Application(options);
}
