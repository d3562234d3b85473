import OpenAI from "openai";

export interface CompletionRequest {
  system: string;
  user: string;
  signal?: AbortSignal;
}

export interface CompletionClient {
  readonly model: string;
  complete(req: CompletionRequest): Promise<string>;
}

export function createOpenAICompletionClient(opts: {
  apiKey: string;
  model: string;
  timeoutMs?: number;
}): CompletionClient {
  // Retries belong to the task queue
  const client = new OpenAI({ apiKey: opts.apiKey, timeout: opts.timeoutMs ?? 120_000, maxRetries: 0 });

  return {
    model: opts.model,
    async complete(req) {
      const completion = await client.chat.completions.create(
        {
          model: opts.model,
          messages: [
            { role: "system", content: req.system },
            { role: "user", content: req.user },
          ],
        },
        { signal: req.signal }
      );
      return completion.choices[0]?.message?.content?.toString() ?? "";
    },
  };
}

/** 4xx other than timeouts and rate limits will fail the same way on every retry. */
export function isPermanentLlmError(err: unknown): boolean {
  if (!(err instanceof OpenAI.APIError)) return false;
  const status = err.status;
  if (typeof status !== "number") return false;
  return status >= 400 && status < 500 && status !== 408 && status !== 409 && status !== 429;
}
