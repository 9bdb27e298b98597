import React from "react";
import MessageBubble from "./MessageBubble";
import type { TranscriptEntry } from "./messages";

interface TranscriptProps {
  entries: TranscriptEntry[];
  /** a reply is on its way */
  pending: boolean;
}

export default function Transcript({ entries, pending }: TranscriptProps) {
  return (
    <div
      className="transcript"
      style={{ padding: 16, display: "flex", flexDirection: "column" }}
    >
      {entries.length === 0 && !pending ? (
        <p style={{ color: "var(--text-secondary)", fontSize: 14 }}>Starting the conversation…</p>
      ) : null}

      {entries.map((entry) => (
        <MessageBubble key={entry.key} author={entry.author} text={entry.text} />
      ))}

      {pending ? (
        <div className="typing-indicator" role="status" aria-label="Assistant is typing">
          <span className="typing-dot" />
          <span className="typing-dot" />
          <span className="typing-dot" />
        </div>
      ) : null}
    </div>
  );
}
