import type { ChartSpec, ViewId, ViewSummary } from './types';

async function getJson<T>(url: string, signal?: AbortSignal): Promise<T> {
  const res = await fetch(url, { signal });
  if (!res.ok) {
    const body: unknown = await res.json().catch(() => null);
    const message =
      typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string'
        ? body.error
        : `${url} returned ${res.status}`;
    throw new Error(message);
  }
  return res.json();
}

export const apiService = {
  getViews: (signal?: AbortSignal) => getJson<ViewSummary[]>('/api/views', signal),

  getView: (viewId: ViewId, category: string | undefined, signal?: AbortSignal) => {
    const query = category ? `?category=${encodeURIComponent(category)}` : '';
    return getJson<ChartSpec>(`/api/views/${viewId}${query}`, signal);
  },
};
