import { GenerationFailureError, GenerationTimeoutError } from "../errors.js";
import type { GenerationPrompt, LLMProvider, TextGenerator } from "./types.js";

/**
 * TextGenerator over any LLMProvider. Calls are bounded by `timeoutMs`; the
 * in-flight request is aborted when the timer fires.
 */
export class LLMTextGenerator implements TextGenerator {
  private llm: LLMProvider;
  private timeoutMs: number;

  constructor(llm: LLMProvider, timeoutMs: number) {
    this.llm = llm;
    this.timeoutMs = timeoutMs;
  }

  async generate(prompt: GenerationPrompt): Promise<string> {
    const controller = new AbortController();
    let rejectTimeout: (err: Error) => void = () => {};
    const timeout = new Promise<never>((_, reject) => {
      rejectTimeout = reject;
    });
    const timer = setTimeout(() => {
      // Settle the race before aborting so the abort rejection cannot win it
      rejectTimeout(new GenerationTimeoutError(this.timeoutMs));
      controller.abort();
    }, this.timeoutMs);

    try {
      const text = await Promise.race([
        this.llm.chat(prompt.system, [{ role: "user", content: prompt.user }], controller.signal),
        timeout,
      ]);
      return text;
    } catch (err) {
      if (err instanceof GenerationTimeoutError) throw err;
      throw new GenerationFailureError(err instanceof Error ? err.message : String(err));
    } finally {
      clearTimeout(timer);
    }
  }
}
