export type PlaceMatch = {
  name: string;
  website: string;
  address: string;
};

// Paid lookup used in Enhanced mode.
export interface PlacesProvider {
  findPlace(query: string): Promise<PlaceMatch | null>;
  hasCredentials(): boolean;
}
