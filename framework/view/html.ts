/**
 * HTML Utilities
 *
 * Escaping and a tagged template for building markup without a template
 * engine. Handlers may return the result directly.
 */

/**
 * Markup that is already safe and must not be escaped again
 */
export class SafeHtml {
  constructor(readonly content: string) {}

  toString(): string {
    return this.content;
  }
}

/**
 * Escape HTML entities. SafeHtml passes through; arrays are joined.
 */
export function escapeHtml(value: unknown): string {
  if (value instanceof SafeHtml) {
    return value.content;
  }
  if (Array.isArray(value)) {
    return value.map(escapeHtml).join('');
  }

  return String(value ?? '')
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Mark content as safe (no escaping)
 */
export function raw(content: string): SafeHtml {
  return new SafeHtml(content);
}

/**
 * HTML tagged template literal
 *
 * Interpolated values are escaped unless wrapped with raw() or produced
 * by another html`` template.
 *
 * @example
 * html`<li>${name}</li>`
 */
export function html(strings: TemplateStringsArray, ...values: unknown[]): SafeHtml {
  let result = strings[0] ?? '';

  for (let i = 0; i < values.length; i++) {
    result += escapeHtml(values[i]) + (strings[i + 1] ?? '');
  }

  return new SafeHtml(result);
}
