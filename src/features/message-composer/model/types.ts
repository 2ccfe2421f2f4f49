/**
 * Message composition types
 */

/**
 * Where the resolved template came from
 */
export type TemplateSource = 'file' | 'config' | 'default';

/**
 * Template text with its source
 */
export interface ResolvedTemplate {
  text: string;
  source: TemplateSource;
}

/**
 * Inputs of the template fallback chain
 */
export interface TemplateSources {
  /** Template file path; read once per run */
  filePath: string;

  /** Inline template from configuration */
  configOverride?: string;

  /** Compiled-in template used when nothing else is set */
  builtinDefault: string;
}

/**
 * Values substituted into a template
 */
export interface TemplateValues {
  url: string;
  video_id: string;
  title: string;
  now: string;
}

/**
 * A link span addressed in UTF-8 bytes of the post text
 */
export interface LinkFacet {
  /** Inclusive start offset in bytes */
  byteStart: number;

  /** Exclusive end offset in bytes */
  byteEnd: number;

  /** Link target */
  uri: string;
}

/**
 * Final post body ready for publishing
 */
export interface ComposedMessage {
  /** Rendered post text, never blank */
  text: string;

  /** Watch URL of the broadcast */
  canonicalUrl: string;

  /** Link facets of `text`, empty when disabled */
  linkFacets: LinkFacet[];
}

/**
 * Options for composing a message
 */
export interface ComposeOptions {
  /** Current time (defaults to now) */
  now?: Date;

  /** Derive link facets from the rendered text (default true) */
  linkFacets?: boolean;
}
