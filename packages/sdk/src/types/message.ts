/**
 * Core message types for conversation history.
 */

export type MessageRole = "user" | "assistant";

/** A prompt written by the user (or synthesized in their place). */
export interface UserMessage {
  readonly role: "user";
  readonly content: string;
}

/** A model response. */
export interface AssistantMessage {
  readonly role: "assistant";
  readonly content: string;
}

/** A single message in the conversation. Frozen once created. */
export type Message = UserMessage | AssistantMessage;

/** Ordered conversation, oldest first. */
export type Sequence = readonly Message[];

/** Counts the tokens of a piece of text. Expected to be pure. */
export type TokenCounter = (text: string) => number;

export function userMessage(content: string): UserMessage {
  return Object.freeze({ role: "user", content });
}

export function assistantMessage(content: string): AssistantMessage {
  return Object.freeze({ role: "assistant", content });
}

/** Build a fresh frozen message from any message-shaped value. */
export function cloneMessage(message: Message): Message {
  switch (message.role) {
    case "user":
      return userMessage(message.content);
    case "assistant":
      return assistantMessage(message.content);
  }
}
