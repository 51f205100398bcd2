"use client";

import { X } from "lucide-react";
import { FC } from "react";
import { Button } from "../ui/button";

interface ChatImagePreviewProps {
  previewUrl: string;
  name?: string;
  onRemove: () => void;
}

export const ChatImagePreview: FC<ChatImagePreviewProps> = (props) => {
  if (!props.previewUrl) {
    return null;
  }

  return (
    <div className="relative w-fit p-2">
      {/* eslint-disable-next-line @next/next/no-img-element */}
      <img
        src={props.previewUrl}
        alt={props.name ?? "Selected image"}
        className="h-24 w-auto rounded-md border object-cover"
      />
      <Button
        variant="secondary"
        size="icon"
        type="button"
        className="absolute top-0 right-0 size-6 rounded-full"
        aria-label="Remove image"
        onClick={props.onRemove}
      >
        <X size={12} />
      </Button>
    </div>
  );
};
