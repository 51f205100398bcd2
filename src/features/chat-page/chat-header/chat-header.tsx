import { AI_DESCRIPTION, AI_NAME } from "@/features/theme/theme-config";
import { Bot } from "lucide-react";
import { FC } from "react";
import { useChat } from "../chat-store";
import { ChatReset } from "./chat-reset";

export const ChatHeader: FC = () => {
  const chat = useChat();

  return (
    <header className="flex items-center justify-between gap-2 border-b py-3">
      <div className="flex items-center gap-2 min-w-0">
        <Bot size={24} className="text-primary shrink-0" />
        <div className="flex flex-col min-w-0">
          <span className="font-semibold truncate">{AI_NAME}</span>
          <span className="text-xs text-muted-foreground truncate">
            {AI_DESCRIPTION}
          </span>
        </div>
      </div>
      <ChatReset
        disabled={!chat.messages.length || chat.loading !== "idle"}
      />
    </header>
  );
};
