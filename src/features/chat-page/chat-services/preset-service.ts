import { DEFAULT_IMAGE_PROMPT, PresetAction } from "./models";

interface PresetDefinition extends PresetAction {
  prompt: string;
}

const PRESETS: PresetDefinition[] = [
  {
    key: "analyze",
    label: "Analyze Image",
    description: "Detailed analysis of the image",
    prompt:
      "Analyze this image in detail. Describe what you see, identify key elements, colors, composition, and any notable features.",
  },
  {
    key: "summarize",
    label: "Summarize",
    description: "Quick summary of image content",
    prompt:
      "Provide a concise summary of what's shown in this image in 2-3 sentences.",
  },
  {
    key: "describe",
    label: "Describe",
    description: "Detailed description for accessibility",
    prompt:
      "Describe this image as if you're explaining it to someone who cannot see it. Be detailed and specific.",
  },
  {
    key: "extract_text",
    label: "Extract Text",
    description: "Extract any text from the image",
    prompt:
      "Extract and transcribe any text visible in this image. If no text is present, say 'No text detected'.",
  },
  {
    key: "identify_objects",
    label: "Identify Objects",
    description: "List objects and items in the image",
    prompt:
      "Identify and list all the objects, people, or items you can see in this image.",
  },
  {
    key: "explain_context",
    label: "Explain Context",
    description: "Explain the setting and context",
    prompt:
      "Explain the context and setting of this image. What's happening? Where might this be taken?",
  },
];

export const listPresets = (): PresetAction[] =>
  PRESETS.map(({ key, label, description }) => ({ key, label, description }));

export const getPresetPrompt = (key: string): string =>
  PRESETS.find((preset) => preset.key === key)?.prompt ?? DEFAULT_IMAGE_PROMPT;

export type ResolvedImagePrompt = {
  prompt: string;
  analysisType: string;
};

/**
 * A preset wins over a custom prompt. Unknown preset keys still label the
 * analysis with the key they were given.
 */
export const resolveImagePrompt = (props: {
  presetAction?: string | null;
  prompt?: string | null;
}): ResolvedImagePrompt => {
  const { presetAction, prompt } = props;

  if (presetAction) {
    return { prompt: getPresetPrompt(presetAction), analysisType: presetAction };
  }

  if (prompt) {
    return { prompt, analysisType: "custom" };
  }

  return { prompt: DEFAULT_IMAGE_PROMPT, analysisType: "default" };
};
