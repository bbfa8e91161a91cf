/**
 * Presentation
 *
 * Return values that ask for rendering, the Renderer they are handed to,
 * and small helpers for building safe markup by hand.
 */

export {
  Fragment,
  Stream,
  Template,
  type Renderer,
  type TemplateContext,
} from './template.ts';
export { SafeHtml, escapeHtml, html, raw } from './html.ts';
