import { describe, it, expect } from "vitest";
import { slugify } from "../src/slug.js";

describe("slugify", () => {
  it("drops parenthesized groups and joins words with hyphens", () => {
    expect(slugify("ISB Farmacologia Clinica (2025/26)")).toBe("isb-farmacologia-clinica");
  });

  it("strips punctuation and collapses whitespace runs", () => {
    expect(slugify("CTF  Chimica: analitica!")).toBe("ctf-chimica-analitica");
    expect(slugify("  LMCU Tossicologia  ")).toBe("lmcu-tossicologia");
  });

  it("keeps existing hyphens", () => {
    expect(slugify("ISB - Modulo A")).toBe("isb---modulo-a");
  });

  it("percent-encodes non-ASCII letters", () => {
    expect(slugify("ISB Attività pratiche")).toBe("isb-attivit%C3%A0-pratiche");
  });

  it("is deterministic and idempotent on its ASCII output", () => {
    const labels = ["ISB Modulo A (I anno)", "CTF Chimica: analitica!", "LMCU_Tossicologia 2"];
    for (const label of labels) {
      const slug = slugify(label);
      expect(slugify(label)).toBe(slug);
      expect(slugify(slug)).toBe(slug);
    }
  });

  it("gives distinct labels distinct slugs", () => {
    const slugs = ["ISB Modulo A", "ISB Modulo B", "CTF Modulo A", "ISB Modulo A bis"].map(slugify);
    expect(new Set(slugs).size).toBe(slugs.length);
  });
});
