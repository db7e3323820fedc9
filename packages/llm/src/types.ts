import type { LlmTask } from "@pitchcheck/shared";

export type { LlmTask };

export interface ModelRef {
  provider: string;
  model: string;
  endpoint: string;
}

export interface LlmRequest {
  system?: string;
  user: string;
  maxOutputTokens?: number;
  temperature?: number;
}

export interface LlmCallResult {
  outputText: string;
  rawResponse: unknown;
  inputTokens: number;
  outputTokens: number;
  endpoint: string;
}

export interface LlmRouter {
  chooseModel(task: LlmTask): ModelRef;
  call(task: LlmTask, ref: ModelRef, request: LlmRequest): Promise<LlmCallResult>;
}

export interface CompleteOptions {
  task?: LlmTask;
}

/**
 * Text-generation collaborator: one prompt in, trimmed completion text out.
 * Implementations throw TransientProviderError when the provider fails.
 */
export interface TextGenerator {
  complete(prompt: string, options?: CompleteOptions): Promise<string>;
}
