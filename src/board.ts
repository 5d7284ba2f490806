import type { Config } from './config.js';

export interface SearchQuery {
  job: string;
  location?: string;
}

export function buildSearchUrl(board: Config['board'], query: SearchQuery): string {
  const url = new URL(board.searchPath, board.baseUrl);
  url.searchParams.set('k', query.job.trim());
  url.searchParams.set('l', query.location?.trim() ?? '');
  return url.toString();
}

export function pageUrl(searchUrl: string, page: number): string {
  if (page <= 1) return searchUrl;
  const url = new URL(searchUrl);
  url.searchParams.set('page', String(page));
  return url.toString();
}
