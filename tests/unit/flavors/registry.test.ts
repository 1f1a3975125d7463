/**
 * Unit tests for the flavor registry.
 */

import { FLAVORS, capability, elementAllowed, flavorProfile, isFlavor } from "../../../src/flavors";

describe("flavor registry", () => {
  it("knows the five flavors", () => {
    expect(FLAVORS).toEqual(["generic", "azure", "google", "amazon-polly", "songbird"]);
    expect(isFlavor("azure")).toBe(true);
    expect(isFlavor("polly")).toBe(false);
  });

  it("supports the root element everywhere", () => {
    for (const flavor of FLAVORS) {
      expect(elementAllowed(flavor, "speak")).toBe(true);
    }
  });

  it("freezes the tables", () => {
    expect(Object.isFrozen(flavorProfile("google"))).toBe(true);
  });

  it("renames Azure marks", () => {
    const mark = flavorProfile("azure").elements.mark;
    expect(mark?.tag).toBe("bookmark");
    expect(mark?.attributeNames?.name).toBe("mark");
  });

  it("adds the mstts namespace for Azure only", () => {
    expect(flavorProfile("azure").root.trailing).toEqual([{ name: "xmlns:mstts", value: "http://www.w3.org/2001/mstts" }]);
    expect(flavorProfile("generic").root.trailing).toEqual([]);
    expect(flavorProfile("google").root.leading).toEqual([]);
  });
});

describe("capability", () => {
  it("returns the attribute rule", () => {
    expect(capability("azure", "mark", "name").support).toBe("supported");
    expect(capability("azure", "prosody", "range")).toEqual({ support: "unsupported" });
  });

  it("reports every attribute of an unsupported element as unsupported", () => {
    expect(capability("amazon-polly", "voice", "name")).toEqual({ support: "unsupported" });
    expect(capability("generic", "express-as", "style")).toEqual({ support: "unsupported" });
  });
});

describe("elementAllowed", () => {
  it("applies Azure parent restrictions", () => {
    expect(elementAllowed("azure", "express-as", "voice")).toBe(true);
    expect(elementAllowed("azure", "express-as", "speak")).toBe(false);
    expect(elementAllowed("azure", "voice", "p")).toBe(false);
    expect(elementAllowed("generic", "voice", "p")).toBe(true);
  });

  it("limits the mstts extensions to Azure", () => {
    for (const flavor of FLAVORS) {
      expect(elementAllowed(flavor, "viseme", "voice")).toBe(flavor === "azure");
      expect(elementAllowed(flavor, "express-as", "voice")).toBe(flavor === "azure");
    }
  });

  it("drops elements a service lacks", () => {
    expect(elementAllowed("amazon-polly", "voice", "speak")).toBe(false);
    expect(elementAllowed("songbird", "audio", "speak")).toBe(false);
    expect(elementAllowed("songbird", "emphasis", "speak")).toBe(false);
    expect(elementAllowed("songbird", "say-as", "speak")).toBe(false);
  });
});
