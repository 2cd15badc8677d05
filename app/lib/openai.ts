import OpenAI from "openai";
import { DEFAULT_OPENAI_MODEL } from "./config";

// Fixed so keyword extraction and explanations stay reasonably stable
// between runs while still varying a little on regenerate.
export const COMPLETION_TEMPERATURE = 0.5;

/**
 * The only thing this project needs from a language model: prompt in,
 * plain text out. Errors are thrown, never returned as text.
 */
export interface CompletionClient {
  complete(prompt: string): Promise<string>;
}

export function createOpenAICompletionClient(options: {
  apiKey: string;
  model?: string;
}): CompletionClient {
  const client = new OpenAI({ apiKey: options.apiKey });
  const model = options.model ?? DEFAULT_OPENAI_MODEL;

  return {
    async complete(prompt) {
      const response = await client.chat.completions.create({
        model,
        temperature: COMPLETION_TEMPERATURE,
        messages: [{ role: "user", content: prompt }],
      });

      return response.choices[0]?.message?.content ?? "";
    },
  };
}
