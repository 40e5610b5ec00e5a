import { describe, expect, it } from "vitest";
import {
  applyTitleCorrection,
  isInformative,
  normalize,
  seasonOrdinals,
  subtitlePrefix,
} from "../../scripts/pipeline/title-normalizer";

describe("normalize", () => {
  it("lowercases and strips punctuation", () => {
    expect(normalize("[Oshi no Ko] 3rd Season")).toBe("oshi no ko 3rd season");
    expect(normalize("Kaguya-sama wa Kokurasetai")).toBe("kaguyasama wa kokurasetai");
  });

  it("treats tabs and newlines as spaces and collapses runs", () => {
    expect(normalize("  Spy\tx\n\nFamily  ")).toBe("spy x family");
  });

  it("drops non-ASCII letters", () => {
    expect(normalize("Café Ōkami")).toBe("caf kami");
  });

  it("is idempotent", () => {
    const once = normalize("Re:Zero - Starting Life (Season 3)");
    expect(normalize(once)).toBe(once);
  });

  it("returns an empty key for punctuation-only input", () => {
    expect(normalize("!!! ---")).toBe("");
  });
});

describe("isInformative", () => {
  it("rejects short or digit-only keys", () => {
    expect(isInformative("")).toBe(false);
    expect(isInformative("2")).toBe(false);
    expect(isInformative("ab")).toBe(false);
    expect(isInformative("1234")).toBe(false);
  });

  it("accepts keys with three characters and a letter", () => {
    expect(isInformative("86 a")).toBe(true);
    expect(isInformative("dan")).toBe(true);
  });
});

describe("applyTitleCorrection", () => {
  const corrections = new Map([["oshi no", "Oshi no Ko"]]);

  it("replaces a known-bad parse regardless of case and padding", () => {
    expect(applyTitleCorrection("  Oshi No ", corrections)).toBe("Oshi no Ko");
  });

  it("leaves other titles untouched", () => {
    expect(applyTitleCorrection("Oshi no Ko", corrections)).toBe("Oshi no Ko");
  });
});

describe("subtitlePrefix", () => {
  it("returns the part before the first spaced dash", () => {
    expect(subtitlePrefix("Kizoku Tensei - Megumareta Umare kara - Part 2")).toBe("Kizoku Tensei");
  });

  it("ignores hyphens inside words and titles without a dash", () => {
    expect(subtitlePrefix("Kaguya-sama wa Kokurasetai")).toBeNull();
    expect(subtitlePrefix(" - leading dash")).toBeNull();
  });
});

describe("seasonOrdinals", () => {
  it("reads ordinal, long and short season markers", () => {
    expect(seasonOrdinals("[Oshi no Ko] 3rd Season")).toEqual([3]);
    expect(seasonOrdinals("Dr. Stone Season 4")).toEqual([4]);
    expect(seasonOrdinals("Mob Psycho S2")).toEqual([2]);
  });

  it("returns nothing for titles without a season marker", () => {
    expect(seasonOrdinals("Frieren")).toEqual([]);
  });
});
