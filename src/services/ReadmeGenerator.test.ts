import { ConnectorConfig } from "./ConnectorConfigService";
import { ReadmeGenerator } from "./ReadmeGenerator";

function createConfig(overrides: Partial<ConnectorConfig> = {}): ConnectorConfig {
  return {
    publisher: "Acme Labs",
    displayName: "Acme",
    description: "Connect to Acme.\n",
    iconBrandColor: "#ABCDEF",
    supportEmail: "support@example.com",
    authentication: { type: "apiKey", displayName: "API Token", description: "Create a token in Acme." },
    prerequisites: ["An Acme account", "A token"],
    knownLimitations: ["Rate limited"],
    ...overrides,
  };
}

describe("ReadmeGenerator", () => {
  test("renders the minimal sections", () => {
    expect(ReadmeGenerator.generate(createConfig(), { swagger: "2.0" })).toBe([
      "# Acme",
      "",
      "Connect to Acme.",
      "",
      "## Publisher",
      "",
      "Acme Labs",
      "",
      "## Prerequisites",
      "",
      "- An Acme account",
      "- A token",
      "",
      "## Obtaining Credentials",
      "",
      "Create a token in Acme.",
      "",
      "## Known Issues and Limitations",
      "",
      "- Rate limited",
      "",
    ].join("\n"));
  });

  test("lists visible operations with triggers first", () => {
    const readme = ReadmeGenerator.generate(
      createConfig({
        authentication: {
          type: "apiKey",
          displayName: "API Token",
          description: "Create a token in Acme.",
          tooltip: "Tokens live under Settings.",
        },
        gettingStarted: "Add the connector to a flow.",
        deploymentInstructions: "Import the package with the CLI.",
      }),
      {
        paths: {
          "/items": {
            get: { operationId: "ListItems", description: "Lists items" },
          },
          "/hooks": {
            post: { summary: "When an item changes", description: "Fires on changes", "x-ms-trigger": "single" },
          },
          "/hooks/{id}": {
            delete: { operationId: "Unsubscribe", "x-ms-visibility": "internal" },
          },
          "/status": {
            get: { operationId: "GetStatus" },
          },
          "/ping": {
            get: { description: "No name to list it under" },
          },
        },
      },
    );

    expect(readme).toContain([
      "## Supported Operations",
      "",
      "- **When an item changes**: Fires on changes",
      "- **ListItems**: Lists items",
      "- **GetStatus**",
      "",
      "## Obtaining Credentials",
      "",
      "Create a token in Acme.",
      "",
      "Tokens live under Settings.",
      "",
      "## Getting Started",
      "",
      "Add the connector to a flow.",
      "",
      "## Known Issues and Limitations",
    ].join("\n"));
    expect(readme.endsWith("## Deployment Instructions\n\nImport the package with the CLI.\n")).toBe(true);
    expect(readme).not.toContain("Unsubscribe");
    expect(readme).not.toContain("No name to list it under");
  });
});
