import { describeError } from '../errors';
import type { PageSnapshot } from '../types';

export type PageFetcher = (url: string) => Promise<PageSnapshot | null>;

/**
 * State for a single diagnosis request: pages already fetched and the
 * warnings collected from best-effort steps. Created per request and dropped
 * with it.
 */
export class DiagnosisSession {
  readonly warnings: string[] = [];
  private readonly pages = new Map<string, Promise<PageSnapshot | null>>();

  constructor(private readonly fetcher: PageFetcher) {}

  fetchPage(url: string): Promise<PageSnapshot | null> {
    const key = url.replace(/#.*$/, '');
    let pending = this.pages.get(key);
    if (!pending) {
      pending = this.fetcher(key);
      this.pages.set(key, pending);
    }
    return pending;
  }

  warn(step: string, error: unknown) {
    const message = `${step}: ${describeError(error)}`;
    console.warn(`[Diagnosis] ${message}`);
    this.warnings.push(message);
  }

  note(message: string) {
    this.warnings.push(message);
  }

  /** Runs a best-effort step; a failure becomes a warning and the fallback value. */
  async attempt<T>(step: string, fallback: T, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      this.warn(step, error);
      return fallback;
    }
  }
}
