/**
 * Message templates
 *
 * A template is tokenized once into text and placeholder segments. Rendering
 * walks the segments a single time, so a substituted value that happens to
 * contain `{MethodName}` is never expanded again, and a placeholder the
 * template does not mention is never formatted at all.
 */

/** One piece of a tokenized template */
export type TemplateSegment =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'placeholder'; readonly name: string };

const PLACEHOLDER_NAME = /^[^{}\s]+$/;

/**
 * Splits a template into segments. `{` without a matching `}`, or with
 * whitespace or nested braces inside, stays literal text.
 */
export function tokenizeTemplate(source: string): TemplateSegment[] {
  const segments: TemplateSegment[] = [];
  let text = '';
  let index = 0;

  while (index < source.length) {
    const open = source.indexOf('{', index);
    if (open === -1) {
      text += source.slice(index);
      break;
    }

    text += source.slice(index, open);
    const close = source.indexOf('}', open + 1);
    const name = close === -1 ? '' : source.slice(open + 1, close);

    if (close !== -1 && PLACEHOLDER_NAME.test(name)) {
      if (text.length > 0) {
        segments.push({ kind: 'text', text });
        text = '';
      }
      segments.push({ kind: 'placeholder', name });
      index = close + 1;
    } else {
      text += '{';
      index = open + 1;
    }
  }

  if (text.length > 0) {
    segments.push({ kind: 'text', text });
  }
  return segments;
}

/**
 * A parsed message template
 */
export class MessageTemplate {
  readonly segments: readonly TemplateSegment[];
  private readonly names: ReadonlySet<string>;

  constructor(readonly source: string) {
    this.segments = Object.freeze(tokenizeTemplate(source));
    this.names = new Set(
      this.segments.flatMap(segment => (segment.kind === 'placeholder' ? [segment.name] : []))
    );
  }

  /** Whether the template references `{name}` */
  has(name: string): boolean {
    return this.names.has(name);
  }

  /** Placeholder names in order of first appearance */
  get placeholders(): string[] {
    return [...this.names];
  }

  /**
   * Renders the template. `resolve` is called at most once per distinct
   * placeholder; returning `undefined` keeps the placeholder text as written.
   */
  render(resolve: (name: string) => string | undefined): string {
    const resolved = new Map<string, string | undefined>();
    let output = '';
    for (const segment of this.segments) {
      if (segment.kind === 'text') {
        output += segment.text;
        continue;
      }
      if (!resolved.has(segment.name)) {
        resolved.set(segment.name, resolve(segment.name));
      }
      const value = resolved.get(segment.name);
      output += value === undefined ? `{${segment.name}}` : value;
    }
    return output;
  }
}
