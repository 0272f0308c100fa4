export * from './types';
export { aggregateMatches, collectEntities, emptySummary, matchedSources } from './aggregator';
export { classify, assertConsistent } from './policy';
export { emptyRunSummary, addResolution, summarize, formatRunSummary } from './run-summary';
export { BatchResolver, isEligible, toLookupQuery } from './batch-resolver';
export type { BatchResolverOptions } from './batch-resolver';
export { createAdapters } from './adapters';
