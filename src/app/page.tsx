import { ChatPage } from "@/features/chat-page/chat-page";
import { AI_NAME } from "@/features/theme/theme-config";

export const metadata = {
  title: AI_NAME,
  description: AI_NAME,
};

export default function Home() {
  return <ChatPage />;
}
