export interface QueryParams {
  date_from: string;
  date_to: string;
}

export type QueryRow = Record<string, unknown>;

/** Anything that can run the borrower query for a date window. */
export interface QueryClient {
  runQuery(params: QueryParams): Promise<QueryRow[]>;
}
