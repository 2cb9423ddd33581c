/**
 * backend/src/shared/html/error-page.ts
 *
 * RULES:
 * - Only safe, user-facing messages reach this page (never driver/SQL text).
 */

import { html } from './html';
import { renderLayout, type PageChrome } from './layout';

export function renderErrorPage(opts: { page: PageChrome; title: string; message: string }): string {
  return renderLayout({
    page: opts.page,
    title: opts.title,
    content: html`<section class="error-page">
<h2>${opts.title}</h2>
<p>${opts.message}</p>
<p><a href="/employees">Back to employees</a></p>
</section>`,
  });
}
