export interface NoDataError {
  readonly type: 'NoDataError';
  readonly message: string;
  readonly areas: readonly string[];
}

export const createNoDataError = (areas: Iterable<string>): NoDataError => {
  const requested = [...areas];
  return {
    type: 'NoDataError',
    message: `No data found for ${requested.map((area) => `'${area}'`).join(', ')}`,
    areas: requested,
  };
};
