export interface WebsiteFetcher {
  // Visible text of the page; throws a classified capability error on failure.
  fetch(url: string): Promise<string>;
  hasCredentials(): boolean;
}
