export type { Expert, ExpertPriority, Provenance, ExpertListResult, ExpertProvider } from './types';
export { ExpertFrontmatterSchema, FormattableExpertSchema, ExpertPrioritySchema, EXPERT_ID_PATTERN } from './expert.schema';
export { agentFilename, sourceMarker, toExpertId, isInstalledSource, assertFormattable } from './naming';
export { parseExpert, serializeExpert, renderExpertBody, personaSections, personaIntro } from './markdown';
export { loadExpertFile, listExpertsInDir, saveExpert, CouncilExpertProvider } from './store';
export type { CouncilExpertProviderOptions } from './store';
