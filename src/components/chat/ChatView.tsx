"use client";

import React, { useCallback, useEffect, useMemo, useRef, useState } from "react";
import ChatHeader from "./ChatHeader";
import MessageInput from "./MessageInput";
import { toTranscript, type ServerMessage } from "./messages";
import Transcript from "./Transcript";

type SessionResponse =
  | { ok: true; sessionId: string; state: string; messages: ServerMessage[] }
  | { ok: false; error: unknown };

type TurnResponse =
  | { ok: true; sessionId: string; state: string; reply: string }
  | { ok: false; error: unknown };

const SESSION_KEY = "service_assistant_session_id";

function readStoredSessionId(): string | null {
  try {
    return window.localStorage.getItem(SESSION_KEY);
  } catch {
    // localStorage can be unavailable (private mode); the session then lives for this page only
    return null;
  }
}

function storeSessionId(id: string | null) {
  try {
    if (id) window.localStorage.setItem(SESSION_KEY, id);
    else window.localStorage.removeItem(SESSION_KEY);
  } catch {
    // see readStoredSessionId
  }
}

function describeError(error: unknown, status: number): string {
  if (typeof error === "string") return error;
  return `HTTP ${status}`;
}

async function closeSession(sessionId: string, keepalive = false) {
  await fetch("/api/conversations/close", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ sessionId }),
    keepalive,
  });
}

export default function ChatView({ brandName }: { brandName: string }) {
  const [sessionId, setSessionId] = useState<string | null>(null);
  const [messages, setMessages] = useState<ServerMessage[]>([]);
  const [isWaiting, setIsWaiting] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const listRef = useRef<HTMLDivElement>(null);

  const scrollToBottom = useCallback(() => {
    requestAnimationFrame(() => {
      listRef.current?.scrollTo({ top: listRef.current.scrollHeight, behavior: "smooth" });
    });
  }, []);

  const loadSession = useCallback(
    async (id: string | null) => {
      setError(null);
      try {
        const query = id ? `?sessionId=${encodeURIComponent(id)}` : "";
        const res = await fetch(`/api/chat${query}`);
        const data: SessionResponse = await res.json();
        if (!data.ok) throw new Error(describeError(data.error, res.status));

        setSessionId(data.sessionId);
        storeSessionId(data.sessionId);
        setMessages(data.messages);
        scrollToBottom();
      } catch (e) {
        setError(e instanceof Error ? e.message : "Failed to load the conversation");
      }
    },
    [scrollToBottom]
  );

  useEffect(() => {
    void loadSession(readStoredSessionId());
  }, [loadSession]);

  async function newChat() {
    if (sessionId) {
      // the old session is dropped even if closing fails
      closeSession(sessionId).catch(() => undefined);
    }
    storeSessionId(null);
    setSessionId(null);
    setMessages([]);
    await loadSession(null);
  }

  async function send(message: string) {
    setError(null);
    const at = new Date().toISOString();
    setMessages((prev) => [...prev, { role: "user", content: message, at }]);
    setIsWaiting(true);
    scrollToBottom();

    try {
      const res = await fetch("/api/chat", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(sessionId ? { sessionId, message } : { message }),
      });
      const data: TurnResponse = await res.json();
      if (!data.ok) throw new Error(describeError(data.error, res.status));

      setSessionId(data.sessionId);
      storeSessionId(data.sessionId);
      setMessages((prev) => [...prev, { role: "assistant", content: data.reply, at: new Date().toISOString() }]);
    } catch (e) {
      setError(e instanceof Error ? e.message : "Failed to send message");
    } finally {
      setIsWaiting(false);
      scrollToBottom();
    }
  }

  const transcript = useMemo(() => toTranscript(messages), [messages]);

  return (
    <main
      style={{
        minHeight: "100vh",
        background: "var(--bg)",
        padding: 24,
      }}
    >
      <div
        style={{
          maxWidth: 900,
          margin: "0 auto",
          display: "flex",
          flexDirection: "column",
          height: "calc(100vh - 48px)",
          gap: 16,
        }}
      >
        <ChatHeader
          brandName={brandName}
          sessionId={sessionId}
          onNewChat={() => void newChat()}
          newChatDisabled={isWaiting}
        />

        {error ? <div style={{ color: "#b00020", fontSize: 14 }}>Error: {error}</div> : null}

        <section
          style={{
            flex: 1,
            minHeight: 0,
            background: "var(--surface)",
            border: "1px solid var(--border)",
            borderRadius: 12,
            overflow: "hidden",
            display: "flex",
            flexDirection: "column",
          }}
        >
          <div ref={listRef} style={{ flex: 1, minHeight: 0, overflow: "auto" }}>
            <Transcript entries={transcript} pending={isWaiting} />
          </div>

          <div style={{ padding: 12, borderTop: "1px solid var(--border)" }}>
            <MessageInput onSend={(m) => void send(m)} disabled={isWaiting} loading={isWaiting} />
          </div>
        </section>
      </div>
    </main>
  );
}
