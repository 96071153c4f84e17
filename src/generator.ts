import OpenAI from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { err, ok, type Result } from "./types";

/** One chat-completion request. */
export interface GenerationRequest {
  system: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
}

/** Why a generation call produced no text. */
export interface GenerationError {
  kind: "api" | "empty";
  message: string;
  cause?: unknown;
}

/** External text-generation collaborator. Implementations never throw. */
export interface TextGenerator {
  getModelName(): string;
  generate(req: GenerationRequest): Promise<Result<string, GenerationError>>;
}

/** The part of a chat completion this module reads. */
export interface ChatCompletionLike {
  choices: Array<{ message: { content: string | null } }>;
}

/**
 * The slice of the OpenAI client this module calls. The SDK client satisfies
 * it structurally, which lets tests hand in a scripted stand-in.
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletionLike>;
    };
  };
}

export interface OpenAIGeneratorOptions {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
  /** Pre-built client (tests); when omitted one is created from apiKey. */
  client?: ChatCompletionsClient;
}

/** Chat-completion backed {@link TextGenerator}. No retries. */
export class OpenAIGenerator implements TextGenerator {
  private readonly client: ChatCompletionsClient;
  private readonly model: string;

  public constructor(opts: OpenAIGeneratorOptions) {
    this.model = opts.model?.trim() || "gpt-3.5-turbo";
    this.client =
      opts.client ??
      new OpenAI({ apiKey: opts.apiKey, timeout: opts.timeoutMs ?? 60_000, maxRetries: 0 });
  }

  public getModelName(): string {
    return this.model;
  }

  public async generate(req: GenerationRequest): Promise<Result<string, GenerationError>> {
    let completion: ChatCompletionLike;
    try {
      completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: "system", content: req.system },
          { role: "user", content: req.prompt },
        ],
        max_tokens: req.maxTokens,
        temperature: req.temperature,
      });
    } catch (e) {
      return err({
        kind: "api",
        message: e instanceof Error ? e.message : String(e),
        cause: e,
      });
    }

    const content = completion.choices[0]?.message.content;
    if (content == null) {
      return err({ kind: "empty", message: "Completion returned no content" });
    }
    return ok(content.trim());
  }
}
