export type SerpOrganicResult = {
  title: string;
  link: string;
  snippet: string;
};

export interface SerpProvider {
  search(query: string): Promise<SerpOrganicResult[]>;
  hasCredentials(): boolean;
}
