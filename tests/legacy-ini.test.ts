/**
 * 旧形式（INI）変換のテスト
 */

import { describe, it, expect } from "vitest";
import { translateLegacyIni, toDirective } from "../src/config/legacy-ini.js";
import { ConfigFormatError } from "../src/pipeline/errors.js";

const SOURCE = "/config/test.ini";

describe("translateLegacyIni", () => {
  it("should translate a minimal config without patching", () => {
    const plan = translateLegacyIni("[options]\nname=myosevka\n[upright]\nq=straight\n", SOURCE);

    expect(plan.planId).toBe("myosevka");
    expect(plan.familyName).toBe("Myosevka");
    expect(plan.styleDirectives.upright).toEqual(new Set(['q = "straight"']));
    expect(plan.styleDirectives.common.size).toBe(0);
    expect(plan.styleDirectives.italic.size).toBe(0);
    expect(plan.styleDirectives.oblique.size).toBe(0);
    expect(plan.nerdFontOptions).toBeNull();
    expect(plan.dialect).toBe("legacy-ini");
    expect(plan.sourcePath).toBe(SOURCE);
  });

  it("should always provide all four axes", () => {
    const plan = translateLegacyIni("[options]\n", SOURCE);
    expect(Object.keys(plan.styleDirectives).sort()).toEqual([
      "common",
      "italic",
      "oblique",
      "upright",
    ]);
  });

  it("should split nerdfont options on whitespace", () => {
    const plan = translateLegacyIni("[options]\nname=myosevka\nnerdfont=powerline  material\n", SOURCE);
    expect(plan.nerdFontOptions).toEqual(["powerline", "material"]);
  });

  it("should read nerdfont options from continuation lines", () => {
    const plan = translateLegacyIni("[options]\nnerdfont = powerline\n    material\n", SOURCE);
    expect(plan.nerdFontOptions).toEqual(["powerline", "material"]);
    expect([...plan.topLevelOptions]).toEqual([]);
  });

  it("should treat an empty or bare nerdfont key as patching with defaults", () => {
    expect(translateLegacyIni("[options]\nnerdfont=\n", SOURCE).nerdFontOptions).toEqual([]);
    expect(translateLegacyIni("[options]\nnerdfont\n", SOURCE).nerdFontOptions).toEqual([]);
  });

  it("should default the plan name", () => {
    const plan = translateLegacyIni("[upright]\nq=straight\n", SOURCE);
    expect(plan.planId).toBe("myosevka");
    expect(plan.familyName).toBe("Myosevka");
  });

  it("should title-case every word of the family name", () => {
    const plan = translateLegacyIni("[options]\nname=my-TERM\n", SOURCE);
    expect(plan.planId).toBe("my-TERM");
    expect(plan.familyName).toBe("My-Term");
  });

  it("should map options to top-level directives and ligature sets", () => {
    const plan = translateLegacyIni(
      "[options]\nname=myosevka\nspacing=term\nexport-glyph-names\nligset=dlig\n",
      SOURCE
    );
    expect(plan.topLevelOptions).toEqual(new Set(['spacing = "term"', "export-glyph-names"]));
    expect(plan.ligatureInherits).toEqual(new Set(["dlig"]));
  });

  it("should read ligature sets from the ligations section", () => {
    const plan = translateLegacyIni("[ligations]\ninherits = dlig haskell\n", SOURCE);
    expect(plan.ligatureInherits).toEqual(new Set(["dlig", "haskell"]));
  });

  it("should keep bare flags and collapse duplicates", () => {
    const plan = translateLegacyIni("[common]\nsp-term\nSP-TERM\n[italic]\nQ=Straight\n", SOURCE);
    expect(plan.styleDirectives.common).toEqual(new Set(["sp-term"]));
    expect(plan.styleDirectives.italic).toEqual(new Set(['q = "Straight"']));
  });

  it("should ignore unknown sections", () => {
    const plan = translateLegacyIni("[extras]\nfoo=bar\n[common]\nsp-fixed\n", SOURCE);
    expect(plan.styleDirectives.common).toEqual(new Set(["sp-fixed"]));
    expect(plan.topLevelOptions.size).toBe(0);
  });

  it("should reject names that are not file-system safe", () => {
    expect(() => translateLegacyIni("[options]\nname=../evil\n", SOURCE)).toThrow(ConfigFormatError);
    expect(() => translateLegacyIni("[options]\nname\n", SOURCE)).toThrow(ConfigFormatError);
  });

  it("should report syntax errors as ConfigFormatError", () => {
    expect(() => translateLegacyIni("name=x\n", SOURCE)).toThrow(
      "/config/test.ini: line 1: Entry outside of any section: name=x"
    );
  });
});

describe("toDirective", () => {
  it("should quote values and keep bare keys", () => {
    expect(toDirective("q", "straight")).toBe('q = "straight"');
    expect(toDirective("sp-term", null)).toBe("sp-term");
  });
});
