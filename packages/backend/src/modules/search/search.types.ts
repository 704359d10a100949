export interface BusinessRecord {
  placeId: string;
  name: string;
  address: string | null;
  phone: string | null;
  website: string | null;
  latitude: number | null;
  longitude: number | null;
  rating: number | null;
  reviewCount: number | null;
  categories: string[];
  /** Opening hours exactly as the provider sent them. */
  hours: Record<string, unknown>;
  /** Id of the job whose search first produced this record. */
  sourceSearch: string | null;
}

export interface Coordinates {
  latitude: number;
  longitude: number;
}

/** Where a search should continue from. `pageIndex` is the next page to fetch. */
export interface SearchCheckpoint {
  pageIndex: number;
  pageToken: string | null;
  recordsSeen: number;
}

export interface SearchPageRequest {
  query: string;
  location: string | null;
  /** Provider-formatted coordinates, e.g. "@37.7749,-122.4194,12z". */
  coordinates: string | null;
  pageIndex: number;
  pageToken: string | null;
}

export interface SearchPage {
  records: unknown[];
  nextPageToken: string | null;
}

/** Wire contract of the remote maps-search service. */
export interface MapsSearchTransport {
  readonly provider: string;
  fetchPage(request: SearchPageRequest): Promise<SearchPage>;
}

export interface Geocoder {
  resolve(location: string): Promise<Coordinates | null>;
}

export type SearchStopReason =
  | 'max_results'
  | 'exhausted'
  | 'page_cap'
  | 'budget_denied'
  | 'transient_failure'
  | 'no_coordinates';

export interface SearchSummary {
  pagesFetched: number;
  recordsYielded: number;
  stopReason: SearchStopReason;
  checkpoint: SearchCheckpoint;
}

export interface SearchRunOptions {
  jobId?: string;
  startAt?: SearchCheckpoint;
  /** Called after every record of a page has been consumed. */
  onPage?: (checkpoint: SearchCheckpoint) => Promise<void>;
}

export interface BusinessStore {
  /** Inserts or merges by place id. The first `sourceSearch` is kept. */
  upsert(record: BusinessRecord): Promise<void>;
  findByPlaceIds(placeIds: string[]): Promise<BusinessRecord[]>;
}
