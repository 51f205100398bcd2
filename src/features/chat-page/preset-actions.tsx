"use client";

import {
  Eye,
  FileText,
  Layers,
  ListChecks,
  LucideIcon,
  MapPin,
  ScanText,
  Sparkles,
  X,
} from "lucide-react";
import { FC } from "react";
import { Button } from "../ui/button";
import { PresetAction } from "./chat-services/models";

const PRESET_ICONS: Record<string, LucideIcon> = {
  analyze: Layers,
  summarize: FileText,
  describe: Eye,
  extract_text: ScanText,
  identify_objects: ListChecks,
  explain_context: MapPin,
};

interface PresetActionsProps {
  presets: ReadonlyArray<PresetAction>;
  disabled?: boolean;
  onSelect: (key: string) => void;
  onDismiss: () => void;
}

export const PresetActions: FC<PresetActionsProps> = (props) => {
  return (
    <div className="flex flex-col gap-2 p-2">
      <div className="flex items-center justify-between">
        <span className="text-xs font-medium text-muted-foreground">
          Choose an action or type your own prompt
        </span>
        <Button
          variant="ghost"
          size="icon"
          className="size-6"
          type="button"
          aria-label="Hide actions"
          onClick={props.onDismiss}
        >
          <X size={14} />
        </Button>
      </div>
      <div className="grid grid-cols-2 md:grid-cols-3 gap-2">
        {props.presets.map((preset) => {
          const Icon = PRESET_ICONS[preset.key] ?? Sparkles;
          return (
            <Button
              key={preset.key}
              variant="outline"
              type="button"
              disabled={props.disabled}
              title={preset.description}
              className="h-auto flex flex-col items-start gap-1 p-2 text-start"
              onClick={() => props.onSelect(preset.key)}
            >
              <span className="flex items-center gap-2 text-primary">
                <Icon size={14} />
                {preset.label}
              </span>
              <span className="text-xs font-normal text-muted-foreground whitespace-break-spaces">
                {preset.description}
              </span>
            </Button>
          );
        })}
      </div>
    </div>
  );
};
