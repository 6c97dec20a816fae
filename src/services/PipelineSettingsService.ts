import { ConnectorConfigService } from './ConnectorConfigService';
import { DEFAULT_PIPELINE_SETTINGS } from './pipelineDefaults';
import { PipelineSettings, PipelineSettingsOverrides } from './settingsTypes';

export class PipelineSettingsService {
    private static instance: PipelineSettingsService;
    private currentSettings: PipelineSettings | null = null;

    private constructor() {}

    static getInstance(): PipelineSettingsService {
        if (!PipelineSettingsService.instance) {
            PipelineSettingsService.instance = new PipelineSettingsService();
        }
        return PipelineSettingsService.instance;
    }

    static getSettings(): PipelineSettings {
        return PipelineSettingsService.getInstance().getCurrentSettings();
    }

    static getDefaultSettings(): PipelineSettings {
        return structuredClone(DEFAULT_PIPELINE_SETTINGS);
    }

    /**
     * Overlays the overrides section by section; arrays replace the defaults
     */
    static resolveSettings(overrides?: PipelineSettingsOverrides): PipelineSettings {
        const defaults = PipelineSettingsService.getDefaultSettings();
        if (!overrides) {
            return defaults;
        }
        return {
            endpointsToKeep: overrides.endpointsToKeep ? [...overrides.endpointsToKeep] : defaults.endpointsToKeep,
            info: { ...defaults.info, ...overrides.info },
            webhook: { ...defaults.webhook, ...overrides.webhook }
        };
    }

    getCurrentSettings(): PipelineSettings {
        if (!this.currentSettings) {
            return PipelineSettingsService.getDefaultSettings();
        }
        return this.currentSettings;
    }

    setCurrentSettings(settings: PipelineSettings): void {
        this.currentSettings = settings;
    }

    /**
     * Reads the `pipeline` section of a connector configuration and makes the
     * result the current settings
     */
    async loadFromConnectorConfig(configPath: string): Promise<PipelineSettings> {
        const config = await ConnectorConfigService.loadConfig(configPath);
        const settings = PipelineSettingsService.resolveSettings(config.pipeline);
        this.currentSettings = settings;
        console.log(`[PipelineSettingsService] Loaded pipeline settings from ${configPath} (${settings.endpointsToKeep.length} allow-listed endpoints)`);
        return settings;
    }

    clearCache(): void {
        this.currentSettings = null;
    }
}
