/**
 * Renderable Return Values
 *
 * Handlers return these markers instead of markup; the content negotiator
 * hands them to the application's Renderer. The framework never looks at
 * template syntax.
 */

export interface TemplateContext {
  [key: string]: unknown;
}

/**
 * Template rendering collaborator
 */
export interface Renderer {
  /**
   * Render a whole template to text
   */
  render(name: string, context: TemplateContext): string | Promise<string>;

  /**
   * Render a template progressively as a sequence of chunks
   */
  renderStream(name: string, context: TemplateContext): Iterable<string> | AsyncIterable<string>;

  /**
   * Render one named block of a template
   */
  renderBlock(name: string, block: string, context: TemplateContext): string | Promise<string>;
}

/**
 * Render a full template into a buffered response
 */
export class Template {
  constructor(
    readonly name: string,
    readonly context: TemplateContext = {}
  ) {}
}

/**
 * Render a template progressively into a chunked response
 */
export class Stream {
  constructor(
    readonly name: string,
    readonly context: TemplateContext = {}
  ) {}
}

/**
 * Render a single block of a template.
 *
 * Inside an event stream, `target` becomes the event name (default
 * `fragment`).
 */
export class Fragment {
  constructor(
    readonly templateName: string,
    readonly blockName: string,
    readonly context: TemplateContext = {},
    readonly target: string | null = null
  ) {}
}
