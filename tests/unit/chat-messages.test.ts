import { toTranscript } from "@/components/chat/messages";

describe("toTranscript", () => {
  it("maps roles to bubble authors and keys entries by position and time", () => {
    expect(
      toTranscript([
        { role: "assistant", content: "Welcome", at: "2026-10-19T10:00:00.000Z" },
        { role: "user", content: "yes", at: "2026-10-19T10:00:05.000Z" },
      ])
    ).toEqual([
      { key: "0-2026-10-19T10:00:00.000Z", author: "bot", text: "Welcome" },
      { key: "1-2026-10-19T10:00:05.000Z", author: "user", text: "yes" },
    ]);
  });

  it("keeps entries with the same timestamp apart", () => {
    const at = "2026-10-19T10:00:00.000Z";
    const keys = toTranscript([
      { role: "user", content: "a", at },
      { role: "user", content: "b", at },
    ]).map((e) => e.key);
    expect(new Set(keys).size).toBe(2);
  });
});
