/**
 * @flashsync/curator - Semantic dedupe and LLM quality curation.
 */

export {
  CacheStore,
  CACHE_DOMAINS,
  isCacheDomain,
  type CacheDomain,
  type CacheDomainStats,
  type CachedClassification,
  type Grade,
} from './caches.js';

export {
  cosineSimilarity,
  normalize,
  chooseBackend,
  findCandidatePairs,
  FlatIpIndex,
  DEFAULT_TOP_K,
  DEFAULT_INDEX_MIN_CARDS,
  type CandidatePair,
  type SimilarityOptions,
} from './similarity.js';

export { embedCards, embeddingText, EMBED_TEMPLATE_ID, type EmbedOptions } from './embed.js';

export {
  CLASSIFY_PAIR,
  GRADE_CARD,
  IMPROVE_CARD,
  renderPrompt,
  templateKey,
  type PromptTemplate,
} from './prompts.js';

export type { ParseOutcome, PipelineOptions } from './pipeline.js';

export {
  classifyPairs,
  parseClassification,
  type ClassificationResult,
  type ClassifiedPair,
  type PairClassification,
} from './classifier.js';

export { gradeCards, parseGrade, NEUTRAL_SCORE, type GradedCard } from './grader.js';

export { improveCards, parseImprovement, type CardReview, type Improvement } from './improver.js';

export {
  resolveDuplicates,
  resolveQuality,
  policyDuplicateChooser,
  applyRemovals,
  applyRewrites,
  type DuplicateChoice,
  type DuplicateChooser,
  type DuplicateResolution,
  type QualityChoice,
  type QualityChooser,
  type QualityResolution,
  type ReviewPosition,
} from './resolver.js';
