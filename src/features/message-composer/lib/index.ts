export {
  buildVideoUrl,
  composeMessage,
  formatBroadcastTime,
  renderTemplate,
} from './message-composer';
export { extractLinkFacets } from './link-facets';
export { resolveTemplate } from './template-resolver';
export { decodeText, DEFAULT_ENCODINGS } from './text-decoder';
