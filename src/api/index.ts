// Barrel export for API module
export {
  fetchMetadata,
  fetchOEmbed,
  parseYtDlpJson,
  runYtDlp,
  MetadataUnavailableError,
  YOUTUBE_OEMBED_ENDPOINT,
} from './metadata-fetcher';
export type { MetadataFetcherOptions } from './metadata-fetcher';
export { tagUrl, titleFromUrl } from './tag-url';
export type { TagUrlOptions } from './tag-url';
