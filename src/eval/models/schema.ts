import { z } from "zod";

export function oracleOutputSchema(min: number, max: number) {
  return z.object({
    score: z.number().min(min).max(max),
    rationale: z.string().max(4000),
  });
}

export type OracleOutput = z.infer<ReturnType<typeof oracleOutputSchema>>;

export type ParseResult = { success: true; data: OracleOutput } | { success: false; error: string };

/**
 * Parse an oracle response: strips a markdown code fence if the model added
 * one, then validates `{ score, rationale }` against the declared range.
 */
export function parseOracleResponse(raw: string, range: { min: number; max: number }): ParseResult {
  const text = raw.trim().replace(/^```(?:json)?\s*|\s*```$/g, "").trim();
  if (text === "") return { success: false, error: "Empty response" };

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    return { success: false, error: `JSON parse failed: ${e instanceof Error ? e.message : String(e)}` };
  }

  const result = oracleOutputSchema(range.min, range.max).safeParse(parsed);
  if (!result.success) {
    return { success: false, error: `Schema validation failed: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}` };
  }
  return { success: true, data: result.data };
}
