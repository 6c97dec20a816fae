import { InfoSettings } from "../../services/settingsTypes";
import { fixInfoSection, normalizeTitle } from "./InfoNormalizer";

const settings: InfoSettings = {
  restrictedTitleWords: ["api", "connector"],
  minDescriptionLength: 30,
  defaultDescription: "Default description long enough to pass the check.",
  defaultContact: { name: "Support", url: "https://example.com/support", email: "support@example.com" },
  connectorMetadata: [{ propertyName: "Website", propertyValue: "https://example.com" }],
};

describe("InfoNormalizer", () => {
  describe("normalizeTitle", () => {
    test("removes restricted words regardless of case", () => {
      expect(normalizeTitle("Acme API", settings.restrictedTitleWords)).toBe("Acme");
      expect(normalizeTitle("acme Connector api v2", settings.restrictedTitleWords)).toBe("acme v2");
    });

    test("only matches whole words", () => {
      expect(normalizeTitle("Rapid Apiary", settings.restrictedTitleWords)).toBe("Rapid Apiary");
    });

    test("strips trailing punctuation left behind", () => {
      expect(normalizeTitle("Acme - API", settings.restrictedTitleWords)).toBe("Acme");
    });

    test("removes restricted words that start or end with punctuation", () => {
      expect(normalizeTitle("Acme (beta) Tools", ["(beta)"])).toBe("Acme Tools");
      expect(normalizeTitle("Acme C++ Tools", ["c++"])).toBe("Acme Tools");
      expect(normalizeTitle("Acme c++x Tools", ["c++"])).toBe("Acme c++x Tools");
      expect(normalizeTitle("Rapid API", ["api"])).toBe("Rapid");
    });
  });

  describe("fixInfoSection", () => {
    test("fills a short description, a missing contact and root metadata", () => {
      const result = fixInfoSection(
        { info: { title: "Acme API", description: "Short" } },
        settings,
      );

      expect(result).toEqual({
        info: {
          title: "Acme",
          description: settings.defaultDescription,
          contact: settings.defaultContact,
        },
        "x-ms-connector-metadata": [{ propertyName: "Website", propertyValue: "https://example.com" }],
      });
    });

    test("keeps an adequate description and an existing contact", () => {
      const info = {
        title: "Acme",
        description: "A description that is comfortably over thirty characters.",
        contact: { name: "Someone" },
      };

      expect(fixInfoSection({ info }, settings).info).toEqual(info);
    });

    test("moves metadata out of info without overwriting root metadata", () => {
      const result = fixInfoSection(
        {
          info: { title: "Acme", "x-ms-connector-metadata": [{ propertyName: "Old", propertyValue: "x" }] },
          "x-ms-connector-metadata": [{ propertyName: "Kept", propertyValue: "y" }],
        },
        settings,
      );

      expect(result.info).not.toHaveProperty("x-ms-connector-metadata");
      expect(result["x-ms-connector-metadata"]).toEqual([{ propertyName: "Kept", propertyValue: "y" }]);
    });

    test("leaves a document without info alone", () => {
      expect(fixInfoSection({ swagger: "2.0" }, settings)).toEqual({ swagger: "2.0" });
    });
  });
});
