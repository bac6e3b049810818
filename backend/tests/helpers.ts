import { vi } from "vitest";
import { createApp } from "../src/app";
import { InMemorySessionStore } from "../src/services/interview/sessionStore";
import type { GenerateTextArgs } from "../src/services/llm/client";
import {
  FEEDBACK_SYSTEM_PROMPT,
  QUESTION_SYSTEM_PROMPT,
  SUMMARY_SYSTEM_PROMPT
} from "../src/services/interview/prompts";

export const FEEDBACK_REPLY =
  "FEEDBACK: Solid answer.\nSTRENGTHS: clear, structured\nIMPROVEMENTS: add metrics\nSCORE: 82";
export const SUMMARY_REPLY = "Strong overall performance.";
export const CHAT_REPLY = "Happy to help with that.";
export const TEST_PROFILE = "You are the assistant for a test portfolio.";

const ONE_HOUR_MS = 60 * 60 * 1000;

/**
 * In-process stand-in for the LLM provider. Questions are numbered in the order
 * they are generated: "Question 1?", "Question 2?", ...
 */
export function createFakeLlm() {
  let questionCount = 0;
  const generateText = vi.fn(async (args: GenerateTextArgs): Promise<string> => {
    switch (args.systemPrompt) {
      case QUESTION_SYSTEM_PROMPT:
        questionCount += 1;
        return `Question ${questionCount}?`;
      case FEEDBACK_SYSTEM_PROMPT:
        return FEEDBACK_REPLY;
      case SUMMARY_SYSTEM_PROMPT:
        return SUMMARY_REPLY;
      default:
        return CHAT_REPLY;
    }
  });
  return { generateText };
}

export type FakeLlm = ReturnType<typeof createFakeLlm>;

export function createTestStore(): InMemorySessionStore {
  return new InMemorySessionStore({ ttlMs: ONE_HOUR_MS });
}

export function createTestApp(llm: FakeLlm = createFakeLlm(), store = createTestStore()) {
  const app = createApp({
    interviewLlm: llm,
    chatLlm: llm,
    store,
    totalQuestions: 5,
    portfolioProfile: TEST_PROFILE
  });
  return { app, llm, store };
}

/** Silences the error logging that failure paths emit. */
export function muteConsoleError() {
  return vi.spyOn(console, "error").mockImplementation(() => undefined);
}
