import React from "react";

export const ChatTextInput = React.forwardRef<
  HTMLTextAreaElement,
  React.TextareaHTMLAttributes<HTMLTextAreaElement>
>(({ ...props }, ref) => {
  return (
    <textarea
      ref={ref}
      className="p-3 md:p-4 w-full focus:outline-none bg-transparent resize-none min-h-[44px] max-h-32"
      placeholder="Type your message here..."
      rows={1}
      {...props}
    />
  );
});
ChatTextInput.displayName = "ChatTextInput";
