// Library entry point: the consensus pipeline without the CLIs

export { MappingTable, MAPPING_COLUMNS, toMappingEntry } from './mapping/MappingTable.js';
export type { MappingEntry, MappingTableStats } from './mapping/MappingTable.js';
export { normalizeSystemName, systemFromBlastId, SUFFIX_EXCEPTIONS } from './mapping/systemName.js';

export { EvidenceAggregator, BLAST_COLUMNS } from './evidence/EvidenceAggregator.js';
export type {
  AggregatedEvidence,
  EvidenceAggregatorOptions,
  EvidenceFiles,
} from './evidence/EvidenceAggregator.js';
export {
  NO_HIT,
  extractSearchName,
  formatForwardSummary,
  formatReverseSummary,
  parseForwardMetrics,
} from './evidence/searchSummary.js';
export type { ForwardMetrics, ReverseMetrics } from './evidence/searchSummary.js';

export { ConsensusEngine } from './consensus/ConsensusEngine.js';
export type { ConsensusEngineOptions } from './consensus/ConsensusEngine.js';
export { passesBlastFiltering } from './consensus/blastMetricFilter.js';
export type { FilterOutcome } from './consensus/blastMetricFilter.js';
export {
  formatCompositeName,
  formatFinalCall,
  parseCompositeName,
} from './consensus/CompositeName.js';

export { ClassificationResolver } from './classification/ClassificationResolver.js';

export { PROFILE_COLUMNS, buildProfileRow, writeProfile } from './profile/ProfileWriter.js';
export type { ProfileRow } from './profile/ProfileWriter.js';
export { summarizeProfile, formatProfileSummary } from './profile/profileSummary.js';
export type { ProfileSummary } from './profile/profileSummary.js';

export { DefenceProfilePipeline } from './pipeline/DefenceProfilePipeline.js';
export type { PipelineOptions, ProfileRunResult } from './pipeline/DefenceProfilePipeline.js';

export { PatternExtractor, CURATION_COLUMNS } from './curation/PatternExtractor.js';
export type {
  CurationRow,
  ExtractionOutcome,
  UnresolvedPattern,
} from './curation/PatternExtractor.js';

export * from './types/consensus.js';
export * from './types/evidence.js';
export * from './errors.js';
export { loadDefenceConfig, validateDefenceConfig, loadAndValidateConfig } from './config/index.js';
export type { DefenceConfig, BlastFilterBounds } from './config/index.js';
