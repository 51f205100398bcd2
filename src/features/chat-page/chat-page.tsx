"use client";
import {
  Message,
  MessageAvatar,
  MessageContent,
} from "@/components/ai-elements/message";
import { chatStore, useChat } from "@/features/chat-page/chat-store";
import { Button } from "@/features/ui/button";
import { ChatTextInput } from "@/features/ui/chat/chat-input-area/chat-text-input";
import { ImageInput } from "@/features/ui/chat/chat-input-area/image-input";
import {
  InputImageStore,
  useInputImage,
} from "@/features/ui/chat/chat-input-area/input-image-store";
import { ChatLoading } from "@/features/ui/chat/chat-message-area/chat-loading";
import { SendHorizontal } from "lucide-react";
import { DragEvent, KeyboardEvent, memo, useEffect, useRef } from "react";
import { ChatHeader } from "./chat-header/chat-header";
import { ChatImagePreview } from "./chat-image-preview";
import { ChatWelcome } from "./chat-welcome";
import MessageContentView from "./message-content";
import { PresetActions } from "./preset-actions";

// Message list isolated to avoid re-render on every input keystroke
const ChatMessages = memo(function ChatMessages() {
  const { messages, loading } = useChat();
  const endRef = useRef<HTMLDivElement>(null);

  useEffect(() => {
    endRef.current?.scrollIntoView?.({ behavior: "smooth" });
  }, [messages.length, loading]);

  return (
    <div className="flex flex-col">
      {messages.map((message, index) => (
        <Message key={index} from={message.role}>
          <MessageAvatar from={message.role} />
          <MessageContent>
            <MessageContentView message={message} />
          </MessageContent>
        </Message>
      ))}
      {loading === "loading" && <ChatLoading />}
      <div ref={endRef} />
    </div>
  );
});

export const ChatPage = () => {
  const { input, loading, messages, presets } = useChat();
  const image = useInputImage();
  const isLoading = loading !== "idle";

  useEffect(() => {
    void chatStore.loadPresets();
  }, []);

  const handleKeyDown = (e: KeyboardEvent<HTMLTextAreaElement>) => {
    if (e.key === "Enter" && !e.shiftKey) {
      void chatStore.submitChat(e);
    }
  };

  const handleDrop = (e: DragEvent<HTMLFormElement>) => {
    e.preventDefault();
    InputImageStore.OnFileChange(e.dataTransfer.files.item(0));
  };

  return (
    <main className="flex flex-1 relative flex-col max-w-4xl w-full mx-auto px-3 gap-3 min-h-screen">
      <ChatHeader />

      {messages.length === 0 && <ChatWelcome />}
      <div className="flex-1">
        <ChatMessages />
      </div>

      <div className="sticky bottom-3">
        <form
          className="rounded-xl border bg-background shadow-sm"
          onSubmit={(e) => void chatStore.submitChat(e)}
          onDragOver={(e) => e.preventDefault()}
          onDrop={handleDrop}
        >
          {image.previewUrl && (
            <ChatImagePreview
              previewUrl={image.previewUrl}
              name={image.file?.name}
              onRemove={() => chatStore.clearImage()}
            />
          )}
          {image.showPresets && (
            <PresetActions
              presets={presets}
              disabled={isLoading}
              onSelect={(key) => void chatStore.sendImageWithPreset(key)}
              onDismiss={() => InputImageStore.HidePresets()}
            />
          )}
          <ChatTextInput
            value={input}
            onChange={(e) => chatStore.updateInput(e.currentTarget.value)}
            onKeyDown={handleKeyDown}
            placeholder={
              image.file
                ? "Ask something about the image..."
                : "Type your message here..."
            }
          />
          <div className="flex items-center justify-between px-2 pb-2">
            <ImageInput disabled={isLoading} />
            <Button
              size="icon"
              type="submit"
              disabled={isLoading || !input.trim()}
              aria-label="Send message"
            >
              <SendHorizontal size={16} />
            </Button>
          </div>
        </form>
      </div>
    </main>
  );
};
