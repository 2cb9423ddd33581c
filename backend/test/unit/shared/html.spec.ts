import { describe, it, expect } from 'vitest';
import { escape, html, raw } from '../../../src/shared/html/html';

describe('escape', () => {
  it('escapes markup and quote characters', () => {
    expect(escape(`<a href="x">it's</a> & more`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;it&#39;s&lt;/a&gt; &amp; more',
    );
  });

  it('renders null, undefined and false as nothing but keeps zero', () => {
    expect(escape(null)).toBe('');
    expect(escape(undefined)).toBe('');
    expect(escape(false)).toBe('');
    expect(escape(0)).toBe('0');
  });
});

describe('html', () => {
  it('escapes interpolated strings', () => {
    expect(html`<p>${'<script>alert(1)</script>'}</p>`.toString()).toBe(
      '<p>&lt;script&gt;alert(1)&lt;/script&gt;</p>',
    );
  });

  it('inserts nested fragments and arrays of fragments without double escaping', () => {
    const items = ['a', '<b>'].map((v) => html`<li>${v}</li>`);
    expect(html`<ul>${items}</ul>`.toString()).toBe('<ul><li>a</li><li>&lt;b&gt;</li></ul>');
  });

  it('passes raw() content through untouched', () => {
    expect(html`<div>${raw('<br>')}</div>`.toString()).toBe('<div><br></div>');
  });
});
