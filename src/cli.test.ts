jest.mock("./api-services/SwaggerCleanerService", () => ({
  SwaggerCleanerService: { processFile: jest.fn(), listAvailableEndpoints: jest.fn() },
}));
jest.mock("./api-services/TriggerAugmenterService", () => ({
  TriggerAugmenterService: { processFile: jest.fn() },
}));
jest.mock("./services/CertificationPackagerService", () => ({
  CertificationPackagerService: { generatePackage: jest.fn() },
}));
jest.mock("./services/PipelineRunner", () => ({
  PipelineRunner: { run: jest.fn() },
  toSlug: jest.fn(),
}));
jest.mock("./services/PackageValidator", () => ({
  PackageValidator: { validatePackage: jest.fn(), printReport: jest.fn() },
}));

import { SwaggerCleanerService } from "./api-services/SwaggerCleanerService";
import { TriggerAugmenterService } from "./api-services/TriggerAugmenterService";
import { parseArgs, runCli, USAGE } from "./cli";
import { CertificationPackagerService } from "./services/CertificationPackagerService";
import { PackageValidator } from "./services/PackageValidator";
import { PipelineRunner } from "./services/PipelineRunner";
import { PipelineSettingsService } from "./services/PipelineSettingsService";

describe("cli", () => {
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.clearAllMocks();
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
  });

  describe("parseArgs", () => {
    test("separates command, positionals, options and flags", () => {
      const args = parseArgs(["pipeline", "in.json", "--config", "c.yaml", "--skip-validate", "--work-dir", "out"]);

      expect(args.command).toBe("pipeline");
      expect(args.positionals).toEqual(["in.json"]);
      expect([...args.options]).toEqual([["--config", "c.yaml"], ["--work-dir", "out"]]);
      expect([...args.flags]).toEqual(["--skip-validate"]);
    });

    test("requires a value for value options", () => {
      expect(() => parseArgs(["clean", "in.json", "--config"])).toThrow("Option --config requires a value");
      expect(() => parseArgs(["clean", "--config", "--work-dir", "x"])).toThrow("Option --config requires a value");
    });
  });

  test("prints usage for help", async () => {
    await expect(runCli(["help"])).resolves.toBe(0);
    await expect(runCli(["clean", "--help"])).resolves.toBe(0);
    expect(logSpy).toHaveBeenCalledWith(USAGE);
    expect(SwaggerCleanerService.processFile).not.toHaveBeenCalled();
  });

  test("no command is a usage error", async () => {
    await expect(runCli([])).resolves.toBe(1);
    expect(logSpy).toHaveBeenCalledWith(USAGE);
  });

  test("unknown commands fail with usage", async () => {
    await expect(runCli(["convert"])).resolves.toBe(1);
    expect(errorSpy).toHaveBeenCalledWith("Error: Unknown command: convert");
    expect(errorSpy).toHaveBeenCalledWith(USAGE);
  });

  test("clean uses the default settings without --config", async () => {
    await expect(runCli(["clean", "in.yaml", "out.yaml"])).resolves.toBe(0);

    expect(SwaggerCleanerService.processFile).toHaveBeenCalledWith(
      "in.yaml",
      "out.yaml",
      PipelineSettingsService.getDefaultSettings(),
    );
  });

  test("clean reads settings from --config", async () => {
    const settings = PipelineSettingsService.resolveSettings({ endpointsToKeep: ["/a/get"] });
    const loadSpy = jest.spyOn(PipelineSettingsService.prototype, "loadFromConnectorConfig").mockResolvedValue(settings);

    await expect(runCli(["clean", "in.yaml", "--config", "connector-config.yaml"])).resolves.toBe(0);

    expect(loadSpy).toHaveBeenCalledWith("connector-config.yaml");
    expect(SwaggerCleanerService.processFile).toHaveBeenCalledWith("in.yaml", undefined, settings);
    loadSpy.mockRestore();
  });

  test("list-endpoints prints each endpoint and a total", async () => {
    jest.mocked(SwaggerCleanerService.listAvailableEndpoints).mockResolvedValue(["/a/get", "/b/post"]);

    await expect(runCli(["list-endpoints", "spec.yaml"])).resolves.toBe(0);

    expect(logSpy.mock.calls.map(call => call[0])).toEqual([
      "Available endpoints in spec.yaml:",
      "  /a/get",
      "  /b/post",
      "Total: 2 endpoints",
    ]);
  });

  test("augment passes the webhook settings", async () => {
    await expect(runCli(["augment", "connector.yaml"])).resolves.toBe(0);

    expect(TriggerAugmenterService.processFile).toHaveBeenCalledWith(
      "connector.yaml",
      undefined,
      PipelineSettingsService.getDefaultSettings().webhook,
    );
  });

  test("package needs three arguments", async () => {
    await expect(runCli(["package", "a.yaml", "config.yaml"])).resolves.toBe(1);
    expect(errorSpy).toHaveBeenCalledWith("Error: package expects at least 3 argument(s)");

    await expect(runCli(["package", "a.yaml", "config.yaml", "out"])).resolves.toBe(0);
    expect(CertificationPackagerService.generatePackage).toHaveBeenCalledWith("a.yaml", "config.yaml", "out");
  });

  test("validate returns 1 for an invalid package", async () => {
    const report = { valid: false, checks: [] };
    jest.mocked(PackageValidator.validatePackage).mockResolvedValue(report);

    await expect(runCli(["validate", "c.yaml", "pkg", "Acme"])).resolves.toBe(1);

    expect(PackageValidator.validatePackage).toHaveBeenCalledWith({
      connectorFile: "c.yaml",
      packageDir: "pkg",
      displayName: "Acme",
      payloadModel: PipelineSettingsService.getDefaultSettings().webhook.payloadModel,
    });
    expect(PackageValidator.printReport).toHaveBeenCalledWith(report);
  });

  test("pipeline requires --config", async () => {
    await expect(runCli(["pipeline", "in.json"])).resolves.toBe(1);
    expect(errorSpy).toHaveBeenCalledWith("Error: pipeline requires --config <file>");
    expect(PipelineRunner.run).not.toHaveBeenCalled();
  });

  test("pipeline forwards its options", async () => {
    jest.mocked(PipelineRunner.run).mockResolvedValue({
      success: true,
      connectorFile: "out/acme-power-automate-connector.yaml",
      packageDir: "out/certified-connectors/Acme",
      messages: [],
    });

    await expect(
      runCli(["pipeline", "in.json", "--config", "c.yaml", "--work-dir", "out", "--skip-validate"]),
    ).resolves.toBe(0);

    expect(PipelineRunner.run).toHaveBeenCalledWith({
      input: "in.json",
      configPath: "c.yaml",
      workDir: "out",
      skipValidate: true,
    });
    expect(logSpy).toHaveBeenCalledWith("✓ Pipeline completed successfully!");
  });

  test("service errors become exit code 1", async () => {
    jest.mocked(CertificationPackagerService.generatePackage).mockRejectedValue(new Error("Failed to write README.md: disk full"));

    await expect(runCli(["package", "a.yaml", "config.yaml", "out"])).resolves.toBe(1);
    expect(errorSpy).toHaveBeenCalledWith("Error: Failed to write README.md: disk full");
    expect(errorSpy).not.toHaveBeenCalledWith(USAGE);
  });
});
