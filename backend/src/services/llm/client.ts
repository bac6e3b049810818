/**
 * LLM capability used by the interview and portfolio services.
 * Production uses OpenAI chat completions; tests pass an in-process fake.
 */

import type OpenAI from "openai";
import type { ChatTurn } from "../../../../packages/shared/src/types";

export type GenerateTextArgs = {
  /** Sent as the final "user" turn. */
  prompt: string;
  systemPrompt: string;
  maxTokens: number;
  temperature: number;
  /** Earlier turns placed between the system prompt and the user prompt. */
  history?: ChatTurn[];
};

export interface LlmClient {
  /** Resolves with the trimmed completion text; rejects on any provider failure. */
  generateText(args: GenerateTextArgs): Promise<string>;
}

export type OpenAILlmClientOptions = {
  apiKey: string | undefined;
  model: string;
  timeoutMs: number;
};

function toMessageParam(turn: ChatTurn): OpenAI.Chat.Completions.ChatCompletionMessageParam {
  switch (turn.role) {
    case "system":
      return { role: "system", content: turn.content };
    case "assistant":
      return { role: "assistant", content: turn.content };
    case "user":
      return { role: "user", content: turn.content };
  }
}

export function createOpenAILlmClient(options: OpenAILlmClientOptions): LlmClient {
  let client: OpenAI | null = null;

  async function getClient(): Promise<OpenAI> {
    if (client) return client;
    if (!options.apiKey) throw new Error("OPENAI_API_KEY is required for text generation");
    const OpenAIClient = (await import("openai")).default;
    // No retries: a failed generation surfaces to the caller as-is.
    client = new OpenAIClient({ apiKey: options.apiKey, timeout: options.timeoutMs, maxRetries: 0 });
    return client;
  }

  return {
    async generateText(args: GenerateTextArgs): Promise<string> {
      const openai = await getClient();
      const completion = await openai.chat.completions.create({
        model: options.model,
        messages: [
          { role: "system", content: args.systemPrompt },
          ...(args.history ?? []).map(toMessageParam),
          { role: "user", content: args.prompt }
        ],
        max_tokens: args.maxTokens,
        temperature: args.temperature
      });

      const text = completion.choices[0]?.message?.content?.trim() ?? "";
      if (!text) throw new Error("LLM returned empty content");
      return text;
    }
  };
}
