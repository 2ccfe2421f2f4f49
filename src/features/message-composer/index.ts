/**
 * Message Composer feature - public API
 *
 * Resolves the post template and renders it for a live broadcast
 */

// Types
export type {
  ComposedMessage,
  ComposeOptions,
  LinkFacet,
  ResolvedTemplate,
  TemplateSource,
  TemplateSources,
} from './model';

// Composition logic
export {
  buildVideoUrl,
  composeMessage,
  decodeText,
  extractLinkFacets,
  formatBroadcastTime,
  renderTemplate,
  resolveTemplate,
} from './lib';
