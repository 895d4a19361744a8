export type TableRow = readonly [left: string, right: string];

/**
 * Formatting primitives for one output markup flavor. The generator composes
 * every document from these and never emits markup of its own.
 */
export interface Backend {
  /** File extension of written documents, without the leading dot. */
  readonly extension: string;
  preformatted(text: string): string;
  block(text: string): string;
  /**
   * `styleHint` names a style or code language for the span. Flavors with no
   * way to express it leave it out.
   */
  italics(text: string, styleHint?: string): string;
  bold(text: string, styleHint?: string): string;
  inlineCode(text: string, styleHint?: string): string;
  table(headerLeft: string, headerRight: string, rows: readonly TableRow[]): string;
  header(level: number, text: string): string;
  code(text: string, language?: string): string;
  link(text: string, target: string): string;
  badge(text: string): string;
  small(text: string): string;
  divider(): string;
  escape(text: string): string;
  /** Wraps a finished document body; `title` is plain text. */
  page(title: string, body: string): string;
}

export const DEFAULT_CODE_LANGUAGE = "cs";
