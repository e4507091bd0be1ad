export { TrackExtractor } from './extractor';
export type { ExtractorOptions } from './extractor';
export {
  normalizeTitle,
  structuralForm,
  stripNoiseTokens,
  NOISE_TOKENS,
} from './normalizer';
export { classifyTitle, isNonMusic, MIN_TITLE_LENGTH } from './non-music-classifier';
export { isValidPair, isCodeLike, filterValid } from './validity';
export {
  createHeuristicSet,
  createNamedEntityHeuristic,
  buildHeuristicInput,
  HeuristicId,
  DEFAULT_WEIGHTS,
  NO_OPINION,
} from './heuristics';
export type {
  Heuristic,
  HeuristicInput,
  HeuristicOutput,
  HeuristicSetOptions,
  PersonRecognizer,
} from './heuristics';
export { evaluateHeuristics } from './evaluator';
export type { EvaluateOptions, HeuristicFailure } from './evaluator';
export {
  scoreCandidates,
  groupCandidates,
  heuristicComponent,
  contextComponent,
  COMPONENT_WEIGHTS,
} from './consensus-scorer';
export type { CandidateGroup, ScoredGroup, ConsensusOptions, SignalFailure } from './consensus-scorer';
export { estimateConfidence } from './confidence';
export type { ConfidenceInput } from './confidence';
export { MusicBrainzCorroborator } from './corroborator';
export type { Corroborator, MusicBrainzCorroboratorOptions } from './corroborator';
export { SemanticScorer, cosineSimilarity } from './semantic-scorer';
export type { SimilarityScorer } from './semantic-scorer';
export { EntityRecognizer, mergePersonTokens } from './entity-recognizer';
export {
  TtlCache,
  MemoryCacheStore,
  getCorroborationCache,
  resetCorroborationCache,
  getMetadataCache,
  resetMetadataCache,
  DEFAULT_CACHE_TTL_MS,
} from './ttl-cache';
export type { CacheEntry, CacheStore, TtlCacheOptions } from './ttl-cache';
export { ExtractionEvents, trackExtractionStats } from './extraction-events';
export type { ExtractionEvent, ExtractionEventData, ExtractionStats, SignalName } from './extraction-events';
export {
  loadConfig,
  resolveWeights,
  parseWeightOverrides,
  ConfigError,
  DEFAULT_WEIGHT,
} from './config';
export type { TaggerConfig, FeatureFlags } from './config';
