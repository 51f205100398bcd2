"use client";

import { MessageCircleQuestion, Sparkles } from "lucide-react";
import {
  DEFAULT_QUESTIONS,
  WELCOME_DESCRIPTION,
  WELCOME_TITLE,
} from "../theme/theme-config";
import { Hero, HeroButton } from "../ui/hero";
import { chatStore } from "./chat-store";

export const ChatWelcome = () => {
  return (
    <Hero
      title={
        <>
          <Sparkles size={32} /> {WELCOME_TITLE}
        </>
      }
      description={WELCOME_DESCRIPTION}
    >
      {DEFAULT_QUESTIONS.map((question) => (
        <HeroButton
          key={question}
          icon={<MessageCircleQuestion size={18} />}
          title={question}
          onClick={() => void chatStore.sendTextMessage(question)}
        />
      ))}
    </Hero>
  );
};
