export interface PopulationLookupError {
  readonly type: 'PopulationLookupError';
  readonly message: string;
  readonly area: string;
}

export const createPopulationLookupError = (area: string): PopulationLookupError => ({
  type: 'PopulationLookupError',
  message: `No population figure for '${area}'; per-capita values cannot be computed`,
  area,
});
