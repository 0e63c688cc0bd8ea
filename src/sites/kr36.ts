import type { SiteAdapter } from "./types";

const QUERY = String.raw`(() => {
  const results = [];
  for (const item of document.querySelectorAll('.kr-flow-article-item')) {
    const href = item.querySelector('a[href*="/p/"]')?.getAttribute('href') || '';
    const title = item.querySelector('.article-item-title')?.textContent?.trim() || '';
    if (!title || !href) continue;

    const desc = item.querySelector('.article-item-description')?.textContent?.trim() || '';
    const date = item.querySelector('.kr-flow-bar-time')?.textContent?.trim() || '';
    results.push({
      source: '36kr',
      title,
      url: href.startsWith('/') ? 'https://36kr.com' + href : href,
      snippet: desc.substring(0, 120),
      author: '36氪',
      date
    });
  }
  return JSON.stringify(results);
})()`;

// 36kr is a client-rendered SPA and needs the longer budget
export const kr36: SiteAdapter = {
  name: "36kr",
  label: "36Kr",
  urlTemplate: "https://36kr.com/search/articles/{query}",
  query: QUERY,
  readyCheck: "document.querySelectorAll('.kr-flow-article-item').length > 0",
  initialWaitSeconds: 6,
  maxWaitSeconds: 18,
  failureMessage: "page did not render (SPA timeout)",
};
