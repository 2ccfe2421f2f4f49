/**
 * Message composer model exports
 */
export type {
  TemplateSource,
  ResolvedTemplate,
  TemplateSources,
  TemplateValues,
  LinkFacet,
  ComposedMessage,
  ComposeOptions,
} from './types';
