/**
 * backend/src/shared/html/layout.ts
 *
 * WHY:
 * - Every page shares the same chrome: display name, slogan, background.
 * - Chrome values come from config + the asset resolver, never from globals.
 */

import { html, raw, type SafeHtml } from './html';

export type PageChrome = Readonly<{
  displayName: string;
  slogan: string;
  // null => page renders without a background
  backgroundUrl: string | null;
}>;

const STYLES = `
body { font-family: system-ui, sans-serif; margin: 0; background-color: #f4f5f7; background-size: cover; background-attachment: fixed; }
header { background: rgba(20, 30, 60, 0.85); color: #fff; padding: 1rem 2rem; }
header h1 { margin: 0; }
.slogan { margin: 0.25rem 0 0; opacity: 0.85; }
main { background: rgba(255, 255, 255, 0.94); margin: 1.5rem auto; max-width: 960px; padding: 1.5rem 2rem; border-radius: 6px; }
table { border-collapse: collapse; width: 100%; }
th, td { text-align: left; padding: 0.4rem 0.6rem; border-bottom: 1px solid #ddd; }
form.inline { display: inline; }
.field { margin-bottom: 0.8rem; }
.field label { display: block; font-weight: 600; }
.has-error input { border-color: #b00020; }
.error { color: #b00020; margin: 0.2rem 0 0; }
.notice { background: #e6f4ea; padding: 0.5rem 0.8rem; border-radius: 4px; }
`;

export function renderLayout(opts: { page: PageChrome; title: string; content: SafeHtml }): string {
  const { page } = opts;

  const bodyAttrs = page.backgroundUrl
    ? html` style="background-image: url('${page.backgroundUrl}')"`
    : '';

  return html`<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${opts.title} | ${page.displayName}</title>
<style>${raw(STYLES)}</style>
</head>
<body${bodyAttrs}>
<header>
<h1>${page.displayName}</h1>
${page.slogan ? html`<p class="slogan">${page.slogan}</p>` : ''}
</header>
<main>
${opts.content}
</main>
</body>
</html>
`.toString();
}
