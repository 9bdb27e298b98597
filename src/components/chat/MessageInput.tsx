import React, { useLayoutEffect, useRef, useState } from "react";

export interface MessageInputProps {
  onSend: (message: string) => void;
  disabled?: boolean;
  loading?: boolean;
}

const MAX_LINES = 6;

export function MessageInput(props: MessageInputProps) {
  const [message, setMessage] = useState("");
  const taRef = useRef<HTMLTextAreaElement>(null);

  const isBusy = Boolean(props.disabled);

  function getMaxHeightPx(): number {
    const ta = taRef.current;
    if (!ta) return 0;

    const style = window.getComputedStyle(ta);
    const lineHeight = parseFloat(style.lineHeight) || parseFloat(style.fontSize) * 1.2 || 18;
    const paddingTop = parseFloat(style.paddingTop) || 0;
    const paddingBottom = parseFloat(style.paddingBottom) || 0;
    const borderTop = parseFloat(style.borderTopWidth) || 0;
    const borderBottom = parseFloat(style.borderBottomWidth) || 0;

    return Math.round(lineHeight * MAX_LINES + paddingTop + paddingBottom + borderTop + borderBottom);
  }

  function adjustHeight() {
    const ta = taRef.current;
    if (!ta) return;

    ta.style.height = "auto";
    const maxH = getMaxHeightPx();
    const nextH = Math.min(ta.scrollHeight, maxH || ta.scrollHeight);
    ta.style.height = `${nextH}px`;

    if (ta.scrollHeight > (maxH || Infinity)) {
      ta.scrollTop = ta.scrollHeight;
    }
  }

  useLayoutEffect(() => {
    adjustHeight();

    function onResize() {
      adjustHeight();
    }

    window.addEventListener("resize", onResize);
    return () => window.removeEventListener("resize", onResize);
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [message]);

  function onSendClick() {
    if (isBusy) return;
    const text = message.trim();
    if (!text) return;

    props.onSend(text);
    setMessage("");
  }

  function onKeyDown(e: React.KeyboardEvent<HTMLTextAreaElement>) {
    // Enter = send, Shift+Enter = newline
    if (e.key === "Enter" && !e.shiftKey) {
      e.preventDefault();
      onSendClick();
    }
  }

  return (
    <div className="message-input_wrapper">
      <div className="message-input_row">
        <textarea
          ref={taRef}
          rows={1}
          className="message-input_textarea"
          placeholder="Type your answer"
          value={message}
          disabled={isBusy}
          onChange={(e) => setMessage(e.target.value)}
          onInput={adjustHeight}
          onKeyDown={onKeyDown}
        />

        <button
          type="button"
          className="btn-primary"
          onClick={onSendClick}
          disabled={isBusy || !message.trim()}
          aria-label="Send message"
        >
          {props.loading ? "Waiting" : "Send"}
        </button>
      </div>
    </div>
  );
}

export default MessageInput;
