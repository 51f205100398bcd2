"use client";

import { Button } from "@/features/ui/button";
import { RotateCcw } from "lucide-react";
import { chatStore } from "@/features/chat-page/chat-store";

export const ChatReset = ({ disabled }: { disabled?: boolean }) => {
  return (
    <Button
      title="New chat"
      aria-label="New chat"
      disabled={disabled}
      size={"default"}
      className={`flex gap-2`}
      variant="outline"
      onClick={() => chatStore.reset()}
    >
      <RotateCcw size={18} />
    </Button>
  );
};
