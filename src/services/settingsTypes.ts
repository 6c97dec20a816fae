export interface ContactInfo {
    name: string;
    url: string;
    email: string;
}

export interface ConnectorMetadataEntry {
    propertyName: string;
    propertyValue: string;
}

export interface InfoSettings {
    /** Words stripped from `info.title`, matched as whole words regardless of case */
    restrictedTitleWords: string[];
    minDescriptionLength: number;
    defaultDescription: string;
    defaultContact: ContactInfo;
    connectorMetadata: ConnectorMetadataEntry[];
}

export interface WebhookSettings {
    registrationPath: string;
    deletePath: string;
    requestModel: string;
    payloadModel: string;
    callbackParameterNames: string[];
    triggerOperationId: string;
    triggerSummary: string;
    triggerDescription: string;
    triggerHint: string;
    deleteOperationId: string;
    defaultWebhookName: string;
    payloadDescription: string;
    eventTypes: string[];
}

export interface PipelineSettings {
    /** `<path>/<method>` entries; empty keeps every operation */
    endpointsToKeep: string[];
    info: InfoSettings;
    webhook: WebhookSettings;
}

export interface PipelineSettingsOverrides {
    endpointsToKeep?: string[];
    info?: Partial<InfoSettings>;
    webhook?: Partial<WebhookSettings>;
}
