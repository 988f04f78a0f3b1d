import { z } from "zod";

/**
 * Text generation backend used to refine player analysis. Implementations
 * must honour the abort signal; the caller owns the timeout.
 */
export interface TextGenerationClient {
  generate(prompt: string, options: { signal: AbortSignal }): Promise<string>;
}

export interface HttpTextGenerationOptions {
  endpoint: string;
  apiKey?: string;
  model?: string;
}

const completionResponseSchema = z.object({
  text: z.string(),
});

/**
 * Posts `{ prompt, model }` to a completion endpoint and expects `{ text }`
 * back.
 */
export class HttpTextGenerationClient implements TextGenerationClient {
  constructor(private readonly options: HttpTextGenerationOptions) {}

  async generate(prompt: string, { signal }: { signal: AbortSignal }): Promise<string> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }

    const response = await fetch(this.options.endpoint, {
      method: "POST",
      headers,
      body: JSON.stringify({ prompt, model: this.options.model }),
      signal,
    });
    if (!response.ok) {
      throw new Error(`Text generation failed with HTTP ${response.status}`);
    }

    const body: unknown = await response.json();
    const parsed = completionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error("Text generation response has no text field");
    }
    return parsed.data.text;
  }
}
