export { FileParserService } from './api-services/FileParserService';
export type { DocumentFormat, ParsedFileContent } from './api-services/FileParserService';
export { SwaggerCleanerService } from './api-services/SwaggerCleanerService';
export type { CleanResult } from './api-services/SwaggerCleanerService';
export { TriggerAugmenterService } from './api-services/TriggerAugmenterService';
export type { AugmentResult, AugmentStepResult } from './api-services/TriggerAugmenterService';
export { YamlFileUtils } from './api-services/YamlFileUtils';
export * from './api-services/transformers';
export type { JsonArray, JsonObject, JsonValue, SwaggerDocument } from './api-services/swaggerTypes';
export * from './services';
export { fileApi, setFileApi, resetFileApi } from './file';
export type { FileApi } from './file';
export { runCli } from './cli';
