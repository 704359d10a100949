import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from '../../shared/retry';
import { TransientProviderError, ValidationError } from '../../shared/errors';
import { describeError, logger } from '../../shared/logger';
import type { BudgetGate } from '../cost/cost-governor';
import { formatCoordinates } from './geocoder';
import { parsePlace } from './place-parser';
import type {
  BusinessRecord,
  Geocoder,
  MapsSearchTransport,
  SearchCheckpoint,
  SearchPage,
  SearchRunOptions,
  SearchStopReason,
  SearchSummary,
} from './search.types';

export const SEARCH_ENDPOINT = 'search';

export interface SearchProviderConfig {
  transport: MapsSearchTransport;
  geocoder: Geocoder;
  budget: BudgetGate;
  costPerPage: number;
  maxPages: number;
  retryPolicy?: RetryPolicy;
}

/**
 * Paginated, budget-gated access to the maps-search provider.
 *
 * Every page is one billable call: authorized before the request and
 * recorded once a response arrives, even an empty one. Records are yielded
 * one at a time so the consumer controls the pace; `onPage` runs only after
 * the consumer has pulled every record of that page.
 */
export class SearchProvider {
  private readonly retryPolicy: RetryPolicy;

  constructor(private readonly config: SearchProviderConfig) {
    this.retryPolicy = config.retryPolicy ?? DEFAULT_RETRY_POLICY;
  }

  async *search(
    query: string,
    location: string | null,
    maxResults: number,
    options: SearchRunOptions = {},
  ): AsyncGenerator<BusinessRecord, SearchSummary, void> {
    const { transport, budget, costPerPage, maxPages } = this.config;
    const provider = transport.provider;
    let checkpoint: SearchCheckpoint = options.startAt ?? { pageIndex: 0, pageToken: null, recordsSeen: 0 };
    let pagesFetched = 0;
    let yielded = 0;

    const finish = (stopReason: SearchStopReason): SearchSummary => {
      logger.info('Search finished', {
        jobId: options.jobId,
        query,
        pagesFetched,
        recordsYielded: yielded,
        stopReason,
      });
      return { pagesFetched, recordsYielded: yielded, stopReason, checkpoint };
    };

    if (checkpoint.recordsSeen >= maxResults) return finish('max_results');

    const coords = location ? await this.config.geocoder.resolve(location) : null;
    const coordinates = coords ? formatCoordinates(coords) : null;

    for (;;) {
      if (checkpoint.recordsSeen >= maxResults) return finish('max_results');
      if (checkpoint.pageIndex >= maxPages) return finish('page_cap');
      // Pages past the first need coordinates
      if (checkpoint.pageIndex > 0 && !coordinates) return finish('no_coordinates');

      const authorization = budget.authorize(provider, SEARCH_ENDPOINT, costPerPage);
      if (!authorization.granted) return finish('budget_denied');
      const { grant } = authorization;

      const { pageIndex, pageToken } = checkpoint;
      let page: SearchPage;
      try {
        page = await withRetry(this.retryPolicy, provider, () =>
          transport.fetchPage({ query, location, coordinates, pageIndex, pageToken }),
        );
      } catch (err) {
        budget.release(grant);
        if (err instanceof TransientProviderError) {
          logger.warn('Search page abandoned', { jobId: options.jobId, pageIndex, error: describeError(err) });
          return finish('transient_failure');
        }
        throw err;
      }

      await budget.record(grant, costPerPage, { success: true });
      pagesFetched += 1;

      let recordsSeen = checkpoint.recordsSeen;
      for (const raw of page.records) {
        if (recordsSeen >= maxResults) break;
        let record: BusinessRecord;
        try {
          record = parsePlace(raw, options.jobId ?? null);
        } catch (err) {
          if (!(err instanceof ValidationError)) throw err;
          logger.warn('Skipping malformed listing', { jobId: options.jobId, pageIndex, error: err.message });
          continue;
        }
        recordsSeen += 1;
        yielded += 1;
        yield record;
      }

      checkpoint = { pageIndex: pageIndex + 1, pageToken: page.nextPageToken, recordsSeen };
      if (options.onPage) await options.onPage(checkpoint);

      if (page.nextPageToken === null && recordsSeen < maxResults) return finish('exhausted');
    }
  }
}
