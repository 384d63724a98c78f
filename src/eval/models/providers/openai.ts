import OpenAI from "openai";
import { evalConfig } from "../../config.js";
import type { CompletionRequest, OracleTransport } from "../types.js";

let client: OpenAI | null = null;

function getClient(): OpenAI {
  if (!client) {
    client = new OpenAI({ apiKey: evalConfig.openaiApiKey });
  }
  return client;
}

export const openaiTransport: OracleTransport = {
  provider: "openai",
  model: evalConfig.openaiModel,
  isConfigured: () => evalConfig.openaiApiKey !== "",
  async complete({ system, user, signal }: CompletionRequest): Promise<string> {
    const response = await getClient().chat.completions.create(
      {
        model: evalConfig.openaiModel,
        temperature: evalConfig.modelTemperature,
        max_tokens: 512,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: system },
          { role: "user", content: user },
        ],
      },
      { signal },
    );
    return response.choices[0]?.message?.content ?? "";
  },
};
