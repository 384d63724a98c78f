import { GoogleGenAI } from "@google/genai";
import { evalConfig } from "../../config.js";
import type { CompletionRequest, OracleTransport } from "../types.js";

let genAI: GoogleGenAI | null = null;

function getGenAI(): GoogleGenAI {
  if (!genAI) {
    genAI = new GoogleGenAI({ apiKey: evalConfig.googleAiApiKey });
  }
  return genAI;
}

function extractText(response: unknown): string {
  if (typeof response === "object" && response !== null && "text" in response) {
    const maybeText = response.text;
    if (typeof maybeText === "string") {
      return maybeText;
    }
  }
  return "";
}

export const geminiTransport: OracleTransport = {
  provider: "gemini",
  model: evalConfig.geminiModel,
  isConfigured: () => evalConfig.googleAiApiKey !== "",
  async complete({ system, user, signal }: CompletionRequest): Promise<string> {
    const response = await getGenAI().models.generateContent({
      model: evalConfig.geminiModel,
      contents: user,
      config: {
        systemInstruction: system,
        temperature: evalConfig.modelTemperature,
        maxOutputTokens: 512,
        responseMimeType: "application/json",
        abortSignal: signal,
      },
    });
    return extractText(response);
  },
};
