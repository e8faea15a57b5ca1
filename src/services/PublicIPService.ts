/**
 * Public IP lookup against a plain-text "what is my IP" endpoint
 */
import type { Logger } from 'pino';
import { createChildLogger } from '../core/Logger.js';
import { IPLookupError, errorMessage } from '../core/errors.js';

export interface PublicIPServiceOptions {
  url?: string;
  requestTimeout?: number;
}

export class PublicIPService {
  private logger: Logger;
  private readonly url: string;
  private readonly requestTimeout: number | undefined;

  constructor(options: PublicIPServiceOptions = {}) {
    this.logger = createChildLogger({ service: 'PublicIPService' });
    this.url = options.url ?? 'https://api.ipify.org?format=text';
    this.requestTimeout = options.requestTimeout;
  }

  /**
   * Fetch the current public IP. The body is returned verbatim.
   */
  async lookup(): Promise<string> {
    let response: Response;
    let text: string;
    try {
      response = await fetch(this.url, {
        signal: this.requestTimeout === undefined ? undefined : AbortSignal.timeout(this.requestTimeout),
      });
      text = await response.text();
    } catch (error) {
      throw new IPLookupError(`error while querying ${this.url} to lookup own ip: ${errorMessage(error)}`);
    }

    if (response.status !== 200) {
      throw new IPLookupError(`unexpected status code ${response.status} while looking up own ip: ${text}`, response.status);
    }

    this.logger.debug({ ip: text }, 'Public IP observed');
    return text;
  }
}
