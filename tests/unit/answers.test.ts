import { isNo, isStillBroken, isYes } from "@/lib/answers";
import { generateSessionId, isSessionId } from "@/lib/chat-ids";
import { errorMessage } from "@/lib/errors";

describe("answers", () => {
  it.each(["yes", "Y", " tak ", "T"])("reads %p as yes", (text) => {
    expect(isYes(text)).toBe(true);
  });

  it.each(["no", "N", "nie "])("reads %p as no", (text) => {
    expect(isNo(text)).toBe(true);
  });

  it("does not read sentences as yes or no", () => {
    expect(isYes("yes please")).toBe(false);
    expect(isNo("no idea")).toBe(false);
  });

  it("detects replies saying the fix did not help", () => {
    expect(isStillBroken("Nadal nie działa")).toBe(true);
    expect(isStillBroken("It still flickers")).toBe(true);
    expect(isStillBroken("I cleaned the probe")).toBe(false);
  });
});

describe("session ids", () => {
  it("embeds the UTC date and a random suffix", () => {
    const id = generateSessionId(new Date("2026-10-19T23:30:00.000Z"));
    expect(id).toMatch(/^SA_20261019_[a-z0-9]{12}$/);
    expect(isSessionId(id)).toBe(true);
  });

  it("produces different ids for the same day", () => {
    const date = new Date("2026-10-19T10:00:00.000Z");
    expect(generateSessionId(date)).not.toBe(generateSessionId(date));
  });

  it("rejects other formats", () => {
    expect(isSessionId("SA_2026101_abc")).toBe(false);
    expect(isSessionId("chat-123")).toBe(false);
  });
});

describe("errorMessage", () => {
  it("reads errors, strings and unknown values", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("Unknown error");
  });
});
