import { ApiPropertiesGenerator } from "./ApiPropertiesGenerator";
import { ConnectorConfig } from "./ConnectorConfigService";

function createConfig(overrides: Partial<ConnectorConfig> = {}): ConnectorConfig {
  return {
    publisher: "Acme Labs",
    displayName: "Acme",
    description: "Connect to Acme.",
    iconBrandColor: "#ABCDEF",
    supportEmail: "support@example.com",
    authentication: { type: "apiKey", displayName: "API Token", description: "Token from your profile" },
    prerequisites: ["An account"],
    knownLimitations: ["None known"],
    ...overrides,
  };
}

describe("ApiPropertiesGenerator", () => {
  test("maps apiKey authentication to a securestring parameter", () => {
    expect(ApiPropertiesGenerator.generate(createConfig())).toEqual({
      properties: {
        connectionParameters: {
          api_key: {
            type: "securestring",
            uiDefinition: {
              displayName: "API Token",
              description: "Token from your profile",
              tooltip: "Token from your profile",
              constraints: { required: "true" },
            },
          },
        },
        iconBrandColor: "#ABCDEF",
        capabilities: [],
        policyTemplateInstances: [],
      },
    });
  });

  test("uses the configured parameter name, tooltip and capabilities", () => {
    const result = ApiPropertiesGenerator.generate(createConfig({
      authentication: {
        type: "apiKey",
        displayName: "API Token",
        description: "Token from your profile",
        tooltip: "Found under Settings",
        parameterName: "token",
      },
      capabilities: ["actions", "triggers"],
    }));

    expect(result).toMatchObject({
      properties: {
        connectionParameters: { token: { uiDefinition: { tooltip: "Found under Settings" } } },
        capabilities: ["actions", "triggers"],
      },
    });
  });

  test("adds a hostUrl parameter and a dynamichosturl policy", () => {
    const result = ApiPropertiesGenerator.generate(createConfig({
      hostUrl: { displayName: "Host", description: "Your Acme host name" },
    }));

    expect(result).toMatchObject({
      properties: {
        connectionParameters: {
          hostUrl: {
            type: "string",
            uiDefinition: {
              displayName: "Host",
              description: "Your Acme host name",
              tooltip: "Your Acme host name",
              constraints: { required: "true" },
            },
          },
        },
        policyTemplateInstances: [{
          templateId: "dynamichosturl",
          title: "Set host URL",
          parameters: { "x-ms-apimTemplateParameter.urlTemplate": "https://@connectionParameters('hostUrl')" },
        }],
      },
    });
  });

  test("keeps a configured URL template", () => {
    const policies = ApiPropertiesGenerator.buildPolicyTemplateInstances(createConfig({
      hostUrl: {
        displayName: "Host",
        description: "Your Acme host name",
        urlTemplate: "https://@connectionParameters('hostUrl')/api",
      },
    }));

    expect(policies[0].parameters).toEqual({
      "x-ms-apimTemplateParameter.urlTemplate": "https://@connectionParameters('hostUrl')/api",
    });
  });

  test("warns about authentication types without a mapping", () => {
    const warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);

    const parameters = ApiPropertiesGenerator.buildConnectionParameters(createConfig({
      authentication: { type: "oauth2", displayName: "Sign in", description: "OAuth" },
    }));

    expect(parameters).toEqual({});
    expect(warnSpy).toHaveBeenCalledWith(
      '[ApiPropertiesGenerator] Authentication type "oauth2" has no connection parameter mapping',
    );
    warnSpy.mockRestore();
  });
});
