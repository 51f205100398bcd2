export const AI_NAME = "Vision Chat";
export const AI_DESCRIPTION = "Chat with AI using text and images";
export const APP_VERSION = "1.0.0";

export const WELCOME_TITLE = `Welcome to ${AI_NAME}`;
export const WELCOME_DESCRIPTION =
  "Ask questions, upload images, or try one of these examples:";

export const DEFAULT_QUESTIONS = [
  "What is artificial intelligence?",
  "Explain machine learning in simple terms",
  "How does neural networks work?",
  "What are the applications of AI?",
];

export const CHAT_ERROR_MESSAGE =
  "Sorry, there was an error processing your request. Please try again.";
export const IMAGE_ERROR_MESSAGE =
  "Sorry, there was an error analyzing the image. Please try again.";
