import React from "react";

export default function ChatHeader({
  brandName,
  sessionId,
  onNewChat,
  newChatDisabled,
}: {
  brandName: string;
  sessionId: string | null;
  onNewChat: () => void;
  newChatDisabled?: boolean;
}) {
  return (
    <header className="chat-header">
      <div className="chat-header-left">
        <span className="bot-avatar" aria-hidden="true">
          🩺
        </span>
        <div className="chat-title-col">
          <span className="chat-title">{`${brandName} Service Assistant`}</span>
          {sessionId ? <span className="chat-subtitle">{sessionId}</span> : null}
        </div>
      </div>
      <div className="chat-header-actions">
        <button type="button" onClick={onNewChat} disabled={newChatDisabled} className="btn-primary">
          New Chat
        </button>
      </div>
    </header>
  );
}
