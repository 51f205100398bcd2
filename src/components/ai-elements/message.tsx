import type { ChatRole } from '@/features/chat-page/chat-services/models';
import { cn } from '@/features/ui/lib';
import { Bot, User } from 'lucide-react';
import type { HTMLAttributes } from 'react';

export type MessageProps = HTMLAttributes<HTMLDivElement> & {
  from: ChatRole;
};

export const Message = ({ className, from, ...props }: MessageProps) => (
  <div
    className={cn(
      'group flex w-full min-w-0 items-start gap-3 py-4',
      from === 'user' ? 'is-user flex-row-reverse' : 'is-assistant',
      className
    )}
    {...props}
  />
);

export type MessageContentProps = HTMLAttributes<HTMLDivElement>;

export const MessageContent = ({
  children,
  className,
  ...props
}: MessageContentProps) => (
  <div
    className={cn(
      'flex flex-col gap-2 overflow-hidden min-w-0 text-foreground text-sm',
      'group-[.is-user]:w-fit group-[.is-user]:max-w-[75%] group-[.is-user]:break-words group-[.is-user]:whitespace-pre-wrap',
      'group-[.is-user]:rounded-xl group-[.is-user]:px-4 group-[.is-user]:py-3 group-[.is-user]:bg-primary group-[.is-user]:text-primary-foreground',
      'group-[.is-assistant]:max-w-[85%] group-[.is-assistant]:rounded-xl group-[.is-assistant]:px-4 group-[.is-assistant]:py-3 group-[.is-assistant]:bg-muted',
      className
    )}
    {...props}
  >
    {children}
  </div>
);

export type MessageAvatarProps = HTMLAttributes<HTMLDivElement> & {
  from: ChatRole;
};

export const MessageAvatar = ({
  from,
  className,
  ...props
}: MessageAvatarProps) => (
  <div
    className={cn(
      'flex size-8 shrink-0 items-center justify-center rounded-full ring-1 ring-border',
      from === 'user' ? 'bg-primary text-primary-foreground' : 'bg-background',
      className
    )}
    {...props}
  >
    {from === 'user' ? <User className="size-4" /> : <Bot className="size-4" />}
  </div>
);
