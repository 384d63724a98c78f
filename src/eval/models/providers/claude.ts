import Anthropic from "@anthropic-ai/sdk";
import { evalConfig } from "../../config.js";
import type { CompletionRequest, OracleTransport } from "../types.js";

let client: Anthropic | null = null;

function getClient(): Anthropic {
  if (!client) {
    client = new Anthropic({ apiKey: evalConfig.anthropicApiKey });
  }
  return client;
}

export const claudeTransport: OracleTransport = {
  provider: "claude",
  model: evalConfig.claudeModel,
  isConfigured: () => evalConfig.anthropicApiKey !== "",
  async complete({ system, user, signal }: CompletionRequest): Promise<string> {
    const response = await getClient().messages.create(
      {
        model: evalConfig.claudeModel,
        max_tokens: 512,
        temperature: evalConfig.modelTemperature,
        system,
        messages: [{ role: "user", content: user }],
      },
      { signal },
    );

    let text = "";
    for (const block of response.content) {
      if (block.type === "text") text += block.text;
    }
    return text;
  },
};
