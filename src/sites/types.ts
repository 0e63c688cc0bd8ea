/**
 * A site adapter is data only: where to go, what to run in the page and how
 * long to wait. The extraction poller supplies all control flow.
 */
export interface SiteAdapter {
  /** Source tag, also used on every record and in CLI commands */
  name: string;
  /** Human-readable platform name */
  label: string;
  /** Search URL with a `{query}` placeholder for the escaped search term */
  urlTemplate: string;
  /** Page-side expression returning JSON.stringify(SearchResult[]) */
  query: string;
  /** Page-side expression, truthy once result items are in the DOM */
  readyCheck: string;
  /** Seconds before the first check */
  initialWaitSeconds: number;
  /** Total seconds allowed, initial wait included */
  maxWaitSeconds: number;
  /** Printed when no results could be extracted */
  failureMessage: string;
}
