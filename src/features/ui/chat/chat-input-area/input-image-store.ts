"use client";

import { proxy, ref, useSnapshot } from "valtio";
import { SupportedFileExtensionsInputImages } from "@/features/chat-page/chat-services/models";
import { logWarn } from "@/features/common/services/logger";

const SUPPORTED_EXTENSIONS: string[] = Object.values(SupportedFileExtensionsInputImages);

export const isSupportedInputImage = (file: File): boolean => {
  const fileExtension = file.name.split(".").pop()?.toUpperCase() ?? "";
  return file.type.startsWith("image/") && SUPPORTED_EXTENSIONS.includes(fileExtension);
};

class InputImageState {
  // Held by reference; a proxied File loses its native methods
  public file: File | null = null;
  public previewUrl: string = "";
  public showPresets: boolean = false;
  // File whose preview is still being read; a later pick or reset replaces it
  private pendingFile: File | null = null;

  public UpdateImage(file: File, previewUrl: string) {
    this.file = ref(file);
    this.previewUrl = previewUrl;
    this.showPresets = true;
  }

  public OnFileChange(file: File | null | undefined) {
    if (!file) {
      return;
    }

    if (!isSupportedInputImage(file)) {
      logWarn("Ignoring unsupported image", { name: file.name, type: file.type });
      return;
    }

    this.pendingFile = ref(file);
    const reader = new FileReader();
    reader.onload = () => {
      if (this.pendingFile !== file) {
        return;
      }
      this.pendingFile = null;
      if (typeof reader.result === "string") {
        this.UpdateImage(file, reader.result);
      }
    };
    reader.readAsDataURL(file);
  }

  public HidePresets() {
    this.showPresets = false;
  }

  public Reset() {
    this.pendingFile = null;
    this.file = null;
    this.previewUrl = "";
    this.showPresets = false;
  }
}

export const InputImageStore = proxy(new InputImageState());

export const useInputImage = () => {
  return useSnapshot(InputImageStore);
};
