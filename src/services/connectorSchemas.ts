export const CONNECTOR_CONFIG_REQUIRED_FIELDS = [
  "publisher",
  "displayName",
  "description",
  "iconBrandColor",
  "supportEmail",
  "authentication",
  "prerequisites",
  "knownLimitations",
] as const;

export const AUTHENTICATION_REQUIRED_FIELDS = [
  "type",
  "displayName",
  "description",
] as const;

export const BRAND_COLOR_PATTERN = "^#[0-9A-Fa-f]{6}$";

export interface ValidationError {
  path: string;
  message: string;
}

const nonEmptyString = { type: "string", minLength: 1 } as const;

const stringList = { type: "array", items: nonEmptyString } as const;

const PIPELINE_SETTINGS_SCHEMA = {
  type: "object",
  additionalProperties: false,
  properties: {
    endpointsToKeep: stringList,
    info: {
      type: "object",
      additionalProperties: false,
      properties: {
        restrictedTitleWords: stringList,
        minDescriptionLength: { type: "integer", minimum: 0 },
        defaultDescription: nonEmptyString,
        defaultContact: {
          type: "object",
          required: ["name", "url", "email"],
          additionalProperties: false,
          properties: {
            name: nonEmptyString,
            url: { type: "string", format: "uri" },
            email: { type: "string", format: "email" },
          },
        },
        connectorMetadata: {
          type: "array",
          items: {
            type: "object",
            required: ["propertyName", "propertyValue"],
            additionalProperties: false,
            properties: {
              propertyName: nonEmptyString,
              propertyValue: nonEmptyString,
            },
          },
        },
      },
    },
    webhook: {
      type: "object",
      additionalProperties: false,
      properties: {
        registrationPath: nonEmptyString,
        deletePath: nonEmptyString,
        requestModel: nonEmptyString,
        payloadModel: nonEmptyString,
        callbackParameterNames: stringList,
        triggerOperationId: nonEmptyString,
        triggerSummary: nonEmptyString,
        triggerDescription: nonEmptyString,
        triggerHint: nonEmptyString,
        deleteOperationId: nonEmptyString,
        defaultWebhookName: nonEmptyString,
        payloadDescription: nonEmptyString,
        eventTypes: stringList,
      },
    },
  },
} as const;

export const CONNECTOR_CONFIG_SCHEMA = {
  $schema: "http://json-schema.org/draft-07/schema#",
  type: "object",
  required: [...CONNECTOR_CONFIG_REQUIRED_FIELDS],
  properties: {
    publisher: nonEmptyString,
    displayName: nonEmptyString,
    description: nonEmptyString,
    iconBrandColor: { type: "string", pattern: BRAND_COLOR_PATTERN },
    supportEmail: { type: "string", format: "email" },
    authentication: {
      type: "object",
      required: [...AUTHENTICATION_REQUIRED_FIELDS],
      properties: {
        type: nonEmptyString,
        displayName: nonEmptyString,
        description: nonEmptyString,
        tooltip: { type: "string" },
        parameterName: nonEmptyString,
      },
    },
    prerequisites: { ...stringList, minItems: 1 },
    knownLimitations: { ...stringList, minItems: 1 },
    gettingStarted: { type: "string" },
    deploymentInstructions: { type: "string" },
    capabilities: stringList,
    hostUrl: {
      type: "object",
      required: ["displayName", "description"],
      properties: {
        displayName: nonEmptyString,
        description: nonEmptyString,
        tooltip: { type: "string" },
        urlTemplate: { type: "string", pattern: "^https://" },
      },
    },
    pipeline: PIPELINE_SETTINGS_SCHEMA,
  },
} as const;
