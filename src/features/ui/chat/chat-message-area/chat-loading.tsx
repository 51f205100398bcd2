export const ChatLoading = () => {
  return (
    <div className="flex items-center gap-2 py-4" role="status">
      <div className="flex gap-1">
        <span className="size-2 rounded-full bg-muted-foreground animate-bounce [animation-delay:-0.3s]" />
        <span className="size-2 rounded-full bg-muted-foreground animate-bounce [animation-delay:-0.15s]" />
        <span className="size-2 rounded-full bg-muted-foreground animate-bounce" />
      </div>
      <div className="text-sm text-muted-foreground">Thinking...</div>
    </div>
  );
};
