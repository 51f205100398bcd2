"use client";

import { Tag, type Schema } from "@markdoc/markdoc";
import { CheckIcon, ClipboardIcon } from "lucide-react";
import { FC, memo, useEffect, useState } from "react";
import { Prism as SyntaxHighlighter } from "react-syntax-highlighter";
import { oneDark } from "react-syntax-highlighter/dist/cjs/styles/prism";
import { logWarn } from "@/features/common/services/logger";
import { Button } from "../button";

export const fence: Schema = {
  render: "CodeBlock",
  attributes: {
    language: {
      type: String,
    },
    content: {
      type: String,
      render: false,
    },
  },
  transform(node) {
    const code = String(node.attributes.content ?? "").replace(/\n$/, "");
    return new Tag("CodeBlock", { language: node.attributes.language }, [code]);
  },
};

interface Props {
  language?: string;
  children: string;
}

export const CodeBlock: FC<Props> = memo(({ language = "text", children }) => {
  const [isIconChecked, setIsIconChecked] = useState(false);

  const handleButtonClick = () => {
    void navigator.clipboard
      .writeText(children)
      .then(() => setIsIconChecked(true))
      .catch((error: unknown) => {
        logWarn("Failed to copy code to clipboard", {
          error: error instanceof Error ? error.message : String(error),
        });
      });
  };

  useEffect(() => {
    const timeout = setTimeout(() => {
      setIsIconChecked(false);
    }, 2000);

    return () => clearTimeout(timeout);
  }, [isIconChecked]);

  return (
    <div className="flex flex-col">
      <div className="flex items-center justify-end">
        <Button
          variant={"ghost"}
          size={"sm"}
          title="Copy code"
          className="flex gap-2"
          onClick={handleButtonClick}
        >
          <span className="text-xs text-muted-foreground">Copy {language}</span>
          {isIconChecked ? (
            <CheckIcon size={16} />
          ) : (
            <ClipboardIcon size={16} />
          )}
        </Button>
      </div>

      <SyntaxHighlighter
        language={language}
        style={oneDark}
        PreTag="pre"
        customStyle={{ maxInlineSize: "100cqw", boxSizing: "border-box", overflow: "auto" }}
      >
        {children}
      </SyntaxHighlighter>
    </div>
  );
});

CodeBlock.displayName = "CodeBlock";
