/** The subset of the global `fetch` the HTTP collaborators use; injectable in tests. */
export type FetchLike = (
  input: string,
  init?: RequestInit,
) => Promise<Response>;
