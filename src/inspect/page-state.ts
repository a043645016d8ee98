import type { PageChangeInfo } from '../types/action-record.js';

export interface PageLike {
  url(): string;
  title(): Promise<string>;
}

export interface PageState {
  url?: string;
  title?: string;
}

export async function capturePageState(page: PageLike | null): Promise<PageState> {
  if (!page) return {};
  let url: string;
  try {
    url = page.url();
  } catch {
    return {};
  }
  // title() rejects while the page is navigating
  const title = await page.title().then(
    (t) => t,
    () => undefined,
  );
  return title === undefined ? { url } : { url, title };
}

export function detectPageChange(before: PageState, after: PageState): PageChangeInfo {
  const changed = before.url !== after.url || before.title !== after.title;
  return {
    changed,
    ...(before.url !== undefined ? { previousUrl: before.url } : {}),
    ...(after.url !== undefined ? { newUrl: after.url } : {}),
    ...(before.title !== undefined ? { previousTitle: before.title } : {}),
    ...(after.title !== undefined ? { newTitle: after.title } : {}),
  };
}
