"use client";
import { proxy, useSnapshot } from "valtio";
import { logError, logInfo, logWarn } from "../common/services/logger";
import {
  CHAT_ERROR_MESSAGE,
  IMAGE_ERROR_MESSAGE,
} from "../theme/theme-config";
import { InputImageStore } from "../ui/chat/chat-input-area/input-image-store";
import {
  fetchPresets,
  postImageUpload,
  postTextChat,
} from "./chat-services/chat-client";
import {
  ConversationHistory,
  ConversationMessage,
  PresetAction,
} from "./chat-services/models";

type chatStatus = "idle" | "loading";

// Shown until /presets answers, and kept if it never does
export const QUICK_ACTIONS: PresetAction[] = [
  { key: "analyze", label: "Analyze", description: "Detailed analysis" },
  { key: "summarize", label: "Summarize", description: "Quick summary" },
  { key: "describe", label: "Describe", description: "Detailed description" },
  { key: "extract_text", label: "Extract Text", description: "OCR text extraction" },
];

class ChatState {
  public messages: ConversationHistory = [];
  public loading: chatStatus = "idle";
  public input: string = "";
  public presets: PresetAction[] = QUICK_ACTIONS;

  public updateInput(value: string) {
    this.input = value;
  }

  public reset() {
    this.messages = [];
    this.input = "";
    InputImageStore.Reset();
  }

  private appendMessages(...messages: ConversationMessage[]) {
    this.messages = [...this.messages, ...messages];
  }

  public async loadPresets() {
    try {
      const presets = await fetchPresets();
      if (presets.length > 0) {
        this.presets = presets;
      }
    } catch (error) {
      logWarn("Falling back to built-in quick actions", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  public async sendTextMessage(message: string) {
    if (!message.trim() || this.loading !== "idle") {
      return;
    }

    const history = this.messages;
    this.appendMessages({ role: "user", content: message });
    this.input = "";
    this.loading = "loading";

    try {
      const result = await postTextChat(message, history);
      this.messages = result.conversation_history;
    } catch (error) {
      logError("Error sending message", {
        error: error instanceof Error ? error.message : String(error),
      });
      this.appendMessages({ role: "assistant", content: CHAT_ERROR_MESSAGE });
    } finally {
      this.loading = "idle";
    }
  }

  public async sendImageWithPreset(presetAction: string) {
    const label =
      this.presets.find((preset) => preset.key === presetAction)?.label ?? presetAction;

    await this.analyzeImage(
      { presetAction },
      `[Image uploaded] - ${label}`
    );
  }

  public async sendImageWithPrompt(prompt: string) {
    if (!prompt.trim()) {
      return;
    }

    await this.analyzeImage({ prompt }, `[Image uploaded] ${prompt}`, () => {
      this.input = "";
    });
  }

  private async analyzeImage(
    request: { presetAction?: string; prompt?: string },
    userContent: string,
    onSuccess?: () => void
  ) {
    const image = InputImageStore.file;
    if (!image || this.loading !== "idle") {
      return;
    }

    this.loading = "loading";
    InputImageStore.HidePresets();

    try {
      const result = await postImageUpload({ image, ...request });
      logInfo("Image analyzed", { analysisType: result.analysis_type });
      this.appendMessages(
        { role: "user", content: userContent },
        { role: "assistant", content: result.response }
      );
      onSuccess?.();
    } catch (error) {
      logError("Error analyzing image", {
        error: error instanceof Error ? error.message : String(error),
      });
      this.appendMessages({ role: "assistant", content: IMAGE_ERROR_MESSAGE });
    } finally {
      this.loading = "idle";
    }
  }

  public clearImage() {
    InputImageStore.Reset();
  }

  public async submitChat(e: { preventDefault: () => void }) {
    e.preventDefault();
    if (this.loading !== "idle") {
      return;
    }

    const input = this.input;
    if (InputImageStore.file && input.trim()) {
      await this.sendImageWithPrompt(input);
    } else if (input.trim()) {
      await this.sendTextMessage(input);
    }
  }
}

export const chatStore = proxy(new ChatState());

export const useChat = () => {
  return useSnapshot(chatStore, { sync: true });
};
