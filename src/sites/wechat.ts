import type { SiteAdapter } from "./types";

// WeChat official-account articles, searched through Sogou
const QUERY = String.raw`(() => {
  const results = [];
  for (const box of document.querySelectorAll('#main .txt-box')) {
    const li = box.closest('li');
    const link = box.querySelector('h3 a');
    const title = link?.textContent?.trim() || '';
    const href = link?.getAttribute('href') || '';
    if (!title || !href) continue;

    const snippet = box.querySelector('p.txt-info, p')?.textContent?.trim() || '';
    const account = li?.querySelector('span.all-time-y2')?.textContent?.trim() || '';
    const dateText = li?.querySelector('span.s2')?.textContent?.trim() || '';
    const dateMatch = dateText.match(/(\d{4}-\d{1,2}-\d{1,2})/);

    results.push({
      source: 'wechat',
      title,
      url: href.startsWith('/') ? 'https://weixin.sogou.com' + href : href,
      snippet: snippet.substring(0, 120),
      author: account,
      date: dateMatch ? dateMatch[1] : ''
    });
  }
  return JSON.stringify(results);
})()`;

export const wechat: SiteAdapter = {
  name: "wechat",
  label: "WeChat (Sogou)",
  urlTemplate: "https://weixin.sogou.com/weixin?type=2&query={query}",
  query: QUERY,
  readyCheck: "document.querySelectorAll('#main .txt-box').length > 0",
  initialWaitSeconds: 4,
  maxWaitSeconds: 12,
  failureMessage: "failed to load search results",
};
