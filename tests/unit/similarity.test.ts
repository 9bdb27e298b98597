import {
  keywordMatch,
  similarityRatio,
  symptomMatch,
  tokenCoverage,
  tokenize,
} from "@/server/knowledge/similarity";

describe("tokenize", () => {
  it("lowercases and splits on anything that is not a letter or digit", () => {
    expect(tokenize("Brak obrazu, SN: AB-12!")).toEqual(["brak", "obrazu", "sn", "ab", "12"]);
  });

  it("keeps letters with diacritics inside words", () => {
    expect(tokenize("Urządzenie się wyłącza")).toEqual(["urządzenie", "się", "wyłącza"]);
  });
});

describe("similarityRatio", () => {
  it("counts matching blocks on both sides of the longest one", () => {
    expect(similarityRatio("abcd", "bcde")).toBe(0.75);
  });

  it("ignores case", () => {
    expect(similarityRatio("ABC", "abc")).toBe(1);
  });

  it("handles empty input", () => {
    expect(similarityRatio("", "")).toBe(1);
    expect(similarityRatio("abc", "")).toBe(0);
  });

  it("is zero for strings with nothing in common", () => {
    expect(similarityRatio("abc", "xyz")).toBe(0);
  });

  it("lets every character of a short second string start a match", () => {
    expect(similarityRatio("xaaa", `${"a".repeat(198)}x`)).toBe(6 / 203);
  });

  it("skips characters that fill more than 1% of a long second string", () => {
    expect(similarityRatio("xaaa", `${"a".repeat(199)}x`)).toBe(2 / 204);
  });

  it("still extends a block over skipped characters", () => {
    expect(similarityRatio("a", "a".repeat(200))).toBe(2 / 201);
  });
});

describe("keywordMatch", () => {
  it("is the share of tokens found inside any keyword", () => {
    expect(keywordMatch(["no", "image"], ["image", "screen"])).toBe(0.5);
  });

  it("matches tokens that are part of a longer keyword", () => {
    expect(keywordMatch(["scree"], ["screen"])).toBe(1);
  });

  it("is zero without keywords or tokens", () => {
    expect(keywordMatch([], ["image"])).toBe(0);
    expect(keywordMatch(["image"], [])).toBe(0);
  });
});

describe("symptomMatch", () => {
  it("only compares symptoms longer than five characters", () => {
    expect(symptomMatch("abc", ["short", "abcdef"])).toBeCloseTo(2 / 3);
  });

  it("is zero when no symptom qualifies", () => {
    expect(symptomMatch("abc", ["abc", "short"])).toBe(0);
  });
});

describe("tokenCoverage", () => {
  it("counts distinct tokens present in the content", () => {
    expect(tokenCoverage("The probe is cold", ["probe", "probe", "warm"])).toBe(0.5);
  });

  it("is zero without tokens", () => {
    expect(tokenCoverage("anything", [])).toBe(0);
  });
});
