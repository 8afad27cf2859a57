/**
 * @marker-engine/registry - Validated, immutable marker registries
 */

export { MarkerRegistry, ruleComponents, visitRules } from './registry';
export type { RegistrySnapshotData } from './registry';
export { loadRegistry, exceedsRuleDepth, DEFAULT_REGISTRY_VERSION } from './loader';
export type { LoadOptions } from './loader';
export { DependencyGraph } from './dependency-graph';
export type { GraphInput, ResolutionResult } from './dependency-graph';
export { parseDocument, formatForExtension, DOCUMENT_EXTENSIONS } from './parse';
export type { DocumentFormat } from './parse';
export { FileMarkerSource, InMemoryMarkerSource } from './sources';
export type { MarkerSource } from './sources';
export { RegistryStore } from './store';
export type { RegistryStoreOptions } from './store';
