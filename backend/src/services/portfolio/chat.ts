/**
 * Portfolio assistant: stateless pass-through to the LLM.
 * The caller sends the conversation so far; only the most recent turns are forwarded.
 */

import type { ChatTurn, PortfolioChatResponse } from "../../../../packages/shared/src/types";
import { GenerationError, errorMessage } from "../errors";
import type { LlmClient } from "../llm/client";

/** History turns forwarded per request; older turns are dropped oldest-first. */
export const HISTORY_WINDOW = 5;
export const CHAT_MAX_TOKENS = 300;
export const CHAT_TEMPERATURE = 0.7;

export type PortfolioChatHandlerOptions = {
  llm: LlmClient;
  /** System preamble describing the portfolio owner. */
  profile: string;
};

export function recentHistory(history: readonly ChatTurn[]): ChatTurn[] {
  return history.slice(-HISTORY_WINDOW);
}

export class PortfolioChatHandler {
  private readonly llm: LlmClient;
  private readonly profile: string;

  constructor(options: PortfolioChatHandlerOptions) {
    this.llm = options.llm;
    this.profile = options.profile;
  }

  async chat(message: string, conversationHistory: readonly ChatTurn[] = []): Promise<PortfolioChatResponse> {
    try {
      const response = await this.llm.generateText({
        prompt: message,
        systemPrompt: this.profile,
        history: recentHistory(conversationHistory),
        maxTokens: CHAT_MAX_TOKENS,
        temperature: CHAT_TEMPERATURE
      });
      return { response };
    } catch (err) {
      console.error("Portfolio chat generation failed:", errorMessage(err));
      throw new GenerationError(`Error processing chat: ${errorMessage(err)}`, { cause: err });
    }
  }
}
