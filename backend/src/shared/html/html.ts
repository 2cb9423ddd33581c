/**
 * backend/src/shared/html/html.ts
 *
 * WHY:
 * - Server-rendered pages need one escaping primitive, so user data
 *   (employee names, config text) can never inject markup.
 *
 * HOW TO USE:
 * - html`<td>${record.name}</td>` escapes every interpolated value.
 * - Nested html`` fragments and arrays of fragments are inserted as-is.
 * - raw() only for trusted constants (e.g. inline CSS).
 */

export class SafeHtml {
  constructor(public readonly content: string) {}

  toString(): string {
    return this.content;
  }
}

export function escape(value: unknown): string {
  if (value instanceof SafeHtml) {
    return value.content;
  }

  if (Array.isArray(value)) {
    return value.map((item) => escape(item)).join('');
  }

  if (value === null || value === undefined || value === false) {
    return '';
  }

  return String(value)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function raw(content: string): SafeHtml {
  return new SafeHtml(content);
}

/**
 * @example
 * const name = '<script>alert("xss")</script>';
 * html`<div>Hello, ${name}!</div>`
 * // <div>Hello, &lt;script&gt;alert(&quot;xss&quot;)&lt;/script&gt;!</div>
 */
export function html(strings: TemplateStringsArray, ...values: unknown[]): SafeHtml {
  let result = '';

  for (let i = 0; i < strings.length; i++) {
    result += strings[i];

    if (i < values.length) {
      result += escape(values[i]);
    }
  }

  return new SafeHtml(result);
}
