import type { SiteAdapter } from "./types";

/**
 * Xiaohongshu notes. Needs a logged-in profile in the debugged browser,
 * otherwise the search page shows a login wall and nothing is extracted.
 *
 * The card footer reads "title / author / date / likes"; the date is the
 * line that looks like a date or a relative time.
 */
const QUERY = String.raw`(() => {
  const results = [];
  for (const item of document.querySelectorAll('section.note-item')) {
    const title = item.querySelector('.footer .title span')?.textContent?.trim() || '';
    const author = item.querySelector('.author .name')?.textContent?.trim() || '';
    const href = item.querySelector('a.cover')?.getAttribute('href') || '';
    const likes = item.querySelector('.like-wrapper .count')?.textContent?.trim() || '';

    const lines = (item.querySelector('.footer')?.innerText || '')
      .split('\n').map((l) => l.trim()).filter(Boolean);
    const date = lines.find((l) =>
      /^\d{4}-\d{2}-\d{2}$/.test(l) || /^\d{2}-\d{2}$/.test(l) || /小时前|天前|昨天/.test(l)
    ) || '';

    const idMatch = href.match(/\/(explore|search_result)\/([a-f0-9]+)/);
    if (!title || !idMatch) continue;

    results.push({
      source: 'xhs',
      title,
      url: 'https://www.xiaohongshu.com/explore/' + idMatch[2],
      author: '@' + author,
      date,
      likes
    });
  }
  return JSON.stringify(results);
})()`;

export const xhs: SiteAdapter = {
  name: "xhs",
  label: "Xiaohongshu",
  urlTemplate: "https://www.xiaohongshu.com/search_result?keyword={query}&type=51",
  query: QUERY,
  readyCheck: "document.querySelectorAll('section.note-item').length > 0",
  initialWaitSeconds: 4,
  maxWaitSeconds: 15,
  failureMessage: "no results (not logged in, or page did not load)",
};
