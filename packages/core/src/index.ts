// Configuration & errors
export * from './config';
export * from './errors';

// Taxonomy model
export * from './taxonomy/contracts';
export * from './taxonomy/taxonomy-tree';
export * from './taxonomy/tree-writer';
export * from './taxonomy/taxonomy-statistics';

// Clustering
export * from './clustering/file-types';
export * from './clustering/keyword-extractor';
export * from './clustering/semantic-theme-clusterer';

// Builder
export * from './builder/taxonomy-builder';
export * from './builder/refinement-parsers';
export * from './builder/folder-categorizer';

// Deep analysis
export * from './analysis/deep-analyzer';
export * from './analysis/task-types';
export * from './analysis/deep-analysis-task-manager';

// Guardrails
export * from './guardrails/user-edit-guardrails';
export * from './guardrails/merge-split-gatekeeper';
export * from './guardrails/depth-enforcer';

// Collaborators
export * from './inspector/types';
export * from './inspector/content-inspector';
export * from './llm/types';
export * from './llm/json-response';
export * from './llm/openai-provider';
export * from './scanner/file-scanner';
export * from './repository/types';
export * from './repository/sqlite-repository';

// Engine
export * from './engine/taxonomy-engine';

// Shared
export * from './shared/async';
export * from './shared/event-channel';
export * from './shared/worker-pool';
