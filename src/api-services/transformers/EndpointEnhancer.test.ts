import { enhanceEndpoints, getEndpointName, toReadableName } from "./EndpointEnhancer";

describe("EndpointEnhancer", () => {
  describe("getEndpointName", () => {
    test("skips a version segment and the extension", () => {
      expect(getEndpointName("/v2/records/{record_id}.json")).toBe("records");
      expect(getEndpointName("/v2/records.json")).toBe("records");
      expect(getEndpointName("/api/forms")).toBe("forms");
    });

    test("handles short paths", () => {
      expect(getEndpointName("/")).toBe("Root");
      expect(getEndpointName("/v1")).toBe("API");
      expect(getEndpointName("/status.json")).toBe("status");
    });
  });

  test("toReadableName splits on underscores and dashes", () => {
    expect(toReadableName("record_id")).toBe("Record Id");
    expect(toReadableName("sort-ORDER")).toBe("Sort Order");
    expect(toReadableName("q")).toBe("Q");
  });

  test("annotates operations and parameters", () => {
    const result = enhanceEndpoints({
      paths: {
        "/v2/records/{record_id}.json": {
          get: {
            operationId: "getRecord",
            parameters: [
              { name: "record_id", in: "path", required: true, type: "string" },
              { name: "page_size", in: "query", type: "integer", description: "Kept as is" },
              { $ref: "#/parameters/limit" },
            ],
          },
          delete: { operationId: "DeleteRecord", description: "Removes a record" },
        },
      },
    });

    expect(result).toEqual({
      paths: {
        "/v2/records/{record_id}.json": {
          get: {
            operationId: "GetRecord",
            description: "Records GET",
            parameters: [
              {
                name: "record_id",
                in: "path",
                required: true,
                type: "string",
                "x-ms-summary": "Record Id",
                description: "Record Id",
                "x-ms-url-encoding": "single",
              },
              {
                name: "page_size",
                in: "query",
                type: "integer",
                description: "Kept as is",
                "x-ms-summary": "Page Size",
              },
              { $ref: "#/parameters/limit" },
            ],
          },
          delete: { operationId: "DeleteRecord", description: "Removes a record" },
        },
      },
    });
  });

  test("keeps existing summaries and url encoding", () => {
    const parameter = {
      name: "id",
      in: "path",
      "x-ms-summary": "Identifier",
      "x-ms-url-encoding": "double",
    };
    const result = enhanceEndpoints({ paths: { "/items/{id}": { get: { parameters: [parameter] } } } });

    expect(result).toEqual({
      paths: {
        "/items/{id}": {
          get: {
            description: "Items GET",
            parameters: [{ ...parameter, description: "Identifier" }],
          },
        },
      },
    });
  });
});
