export { ApiPropertiesGenerator } from './ApiPropertiesGenerator';
export { CertificationPackagerService } from './CertificationPackagerService';
export type { CertificationPackage } from './CertificationPackagerService';
export { ConnectorConfigService } from './ConnectorConfigService';
export type { AuthenticationConfig, ConfigValidationResult, ConnectorConfig, HostUrlConfig } from './ConnectorConfigService';
export { PackageValidator } from './PackageValidator';
export type { CheckStatus, PackageValidationOptions, PackageValidationReport, ValidationCheck } from './PackageValidator';
export { PipelineRunner, toSlug } from './PipelineRunner';
export type { PipelineOptions, PipelineResult } from './PipelineRunner';
export { PipelineSettingsService } from './PipelineSettingsService';
export { ReadmeGenerator } from './ReadmeGenerator';
export { DEFAULT_PIPELINE_SETTINGS } from './pipelineDefaults';
export type {
    ContactInfo,
    ConnectorMetadataEntry,
    InfoSettings,
    PipelineSettings,
    PipelineSettingsOverrides,
    WebhookSettings
} from './settingsTypes';
