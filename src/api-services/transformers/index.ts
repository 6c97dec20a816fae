export { filterEndpoints, listEndpoints, countEndpoints, normalizeEndpointKey, toEndpointKey } from './EndpointFilter';
export { keepOnlySuccessResponses } from './ResponseFilter';
export { findUsedModels, removeUnusedModels } from './ModelPruner';
export type { PruneResult } from './ModelPruner';
export { fixInfoSection, normalizeTitle } from './InfoNormalizer';
export { makeWebhookUrlRequired } from './WebhookSchemaFixer';
export { enhanceEndpoints, getEndpointName, toReadableName } from './EndpointEnhancer';
export { removeSiblingsOfRefs } from './RefSanitizer';
export { removeAnyOfOneOf } from './CompositionRemover';
export { forEachOperation } from './operations';
export type { OperationContext } from './operations';
