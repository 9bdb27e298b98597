import React, { useMemo } from "react";
import { renderMessageHtml } from "./markdown";

interface MessageBubbleProps {
  author: "bot" | "user";
  text: string;
}

const MessageBubble: React.FC<MessageBubbleProps> = ({ author, text }) => {
  const html = useMemo(() => renderMessageHtml(text), [text]);

  return (
    <div className={`message-bubble message-bubble-${author}`}>
      <div
        className="message-text"
        style={{ textAlign: "left", direction: "ltr" }}
        dangerouslySetInnerHTML={{ __html: html }}
      />
    </div>
  );
};

export default MessageBubble;
