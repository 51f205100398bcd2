import { Image as ImageIcon } from "lucide-react";
import { FC, useRef } from "react";
import { Button } from "../../button";
import { InputImageStore } from "./input-image-store";
import { SupportedFileExtensionsInputImages } from "@/features/chat-page/chat-services/models";

export const ImageInput: FC<{ disabled?: boolean }> = (props) => {
  const fileInputRef = useRef<HTMLInputElement>(null);

  const handleButtonClick = () => {
    if (fileInputRef.current) {
      fileInputRef.current.value = "";
    }
    fileInputRef.current?.click();
  };

  return (
    <div className="flex gap-2">
      <input
        type="file"
        accept={Object.values(SupportedFileExtensionsInputImages)
          .map((ext) => "image/" + ext.toLowerCase())
          .join(",")}
        name="image"
        ref={fileInputRef}
        className="hidden"
        data-testid="image-file-input"
        onChange={(e) => InputImageStore.OnFileChange(e.target.files?.[0])}
      />
      <Button
        size="icon"
        variant={"ghost"}
        type="button"
        disabled={props.disabled}
        onClick={handleButtonClick}
        aria-label="Add an image to the chat input"
      >
        <ImageIcon size={16} />
      </Button>
    </div>
  );
};
