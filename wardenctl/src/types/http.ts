/** The slice of `fetch` the gateway uses; injectable for tests. */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;
