import Markdoc, { Tag, type RenderableTreeNode } from "@markdoc/markdoc";
import React, { FC } from "react";
import { CodeBlock, fence } from "./code-block";

interface Props {
  content: string;
}

// Model replies may quote template syntax; `{%` must stay text, not open a tag
const TAG_OPEN = "{%";
const TAG_OPEN_PLACEHOLDER = "\uE000";

const restoreTagOpen = (node: RenderableTreeNode): RenderableTreeNode => {
  if (typeof node === "string") {
    return node.replaceAll(TAG_OPEN_PLACEHOLDER, TAG_OPEN);
  }
  if (Tag.isTag(node)) {
    node.children = node.children.map(restoreTagOpen);
  }
  return node;
};

export const Markdown: FC<Props> = (props) => {
  const ast = Markdoc.parse(props.content.replaceAll(TAG_OPEN, TAG_OPEN_PLACEHOLDER));

  const content = restoreTagOpen(
    Markdoc.transform(ast, {
      nodes: {
        fence,
      },
    })
  );

  return (
    <div className="prose prose-slate dark:prose-invert break-words prose-p:leading-relaxed prose-pre:p-0 max-w-none">
      {Markdoc.renderers.react(content, React, {
        components: { CodeBlock },
      })}
    </div>
  );
};
