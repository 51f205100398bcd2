"use client";

import { Check, Copy } from "lucide-react";
import { FC, useState } from "react";
import { logWarn } from "../common/services/logger";
import { Markdown } from "../ui/markdown/markdown";
import { Button } from "../ui/button";
import { ChatRole, MessageContentPart } from "./chat-services/models";

type MessageContentValue = string | ReadonlyArray<MessageContentPart>;

export const messageText = (content: MessageContentValue): string => {
  if (typeof content === "string") {
    return content;
  }

  return content
    .filter(
      (part): part is Extract<MessageContentPart, { type: "text" }> =>
        part.type === "text"
    )
    .map((part) => part.text)
    .join("\n");
};

const messageImages = (content: MessageContentValue): string[] => {
  if (typeof content === "string") {
    return [];
  }

  return content.flatMap((part) =>
    part.type === "image_url" ? [part.image_url.url] : []
  );
};

interface MessageContentProps {
  message: { role: ChatRole; content: MessageContentValue };
}

const MessageContent: FC<MessageContentProps> = ({ message }) => {
  const [copied, setCopied] = useState(false);
  const text = messageText(message.content);
  const images = messageImages(message.content);

  const handleCopy = () => {
    void navigator.clipboard
      .writeText(text)
      .then(() => {
        setCopied(true);
        setTimeout(() => setCopied(false), 1500);
      })
      .catch((error: unknown) => {
        logWarn("Failed to copy to clipboard", {
          error: error instanceof Error ? error.message : String(error),
        });
      });
  };

  if (message.role !== "assistant") {
    return (
      <div className="flex flex-col gap-2">
        {images.map((url, index) => (
          // eslint-disable-next-line @next/next/no-img-element
          <img
            key={index}
            src={url}
            alt="Uploaded image"
            className="max-h-64 w-auto rounded-md"
          />
        ))}
        {text && <span>{text}</span>}
      </div>
    );
  }

  return (
    <div className="flex flex-col gap-1">
      <Markdown content={text} />
      <div className="flex justify-start">
        <Button
          variant="ghost"
          size="icon"
          className="size-7"
          title="Copy message"
          aria-label="Copy message"
          onClick={handleCopy}
        >
          {copied ? <Check className="size-3.5" /> : <Copy className="size-3.5" />}
        </Button>
      </div>
    </div>
  );
};

export default MessageContent;
