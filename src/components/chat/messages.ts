/** A message as the chat API returns it. */
export type ServerMessage = {
  role: "user" | "assistant";
  content: string;
  at: string;
};

export type TranscriptEntry = {
  key: string;
  author: "bot" | "user";
  text: string;
};

export function toTranscript(messages: ServerMessage[]): TranscriptEntry[] {
  return messages.map((m, i) => ({
    key: `${i}-${m.at}`,
    author: m.role === "user" ? "user" : "bot",
    text: m.content,
  }));
}
