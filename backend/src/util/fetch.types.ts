export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;
