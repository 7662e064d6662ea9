import fetch from "node-fetch";
import logger from "../utils/logger.js";
import { CompletionError } from "../models/errors.js";
import type { ApiMessage } from "./promptService.js";

interface LMChoice {
  message?: { role?: string; content?: unknown };
}
interface LMResponse {
  choices: LMChoice[];
}
interface LMErrorBody {
  error: { message: string };
}

function isLMResponse(data: unknown): data is LMResponse {
  return typeof data === "object" && data !== null && "choices" in data && Array.isArray(data.choices);
}

function isLMErrorBody(data: unknown): data is LMErrorBody {
  if (typeof data !== "object" || data === null || !("error" in data)) return false;
  const { error } = data;
  return typeof error === "object" && error !== null && "message" in error && typeof error.message === "string";
}

export interface CompletionRequest {
  model: string;
  messages: ApiMessage[];
  temperature: number;
  maxTokens?: number;
}

export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>;
}

export interface CompletionClientOptions {
  apiUrl: string;
  apiKey?: string;
  timeoutMs: number;
}

export const DEFAULT_MAX_TOKENS = 400;

export function createCompletionClient({ apiUrl, apiKey, timeoutMs }: CompletionClientOptions): CompletionClient {
  return {
    async complete({ model, messages, temperature, maxTokens = DEFAULT_MAX_TOKENS }) {
      if (!apiKey) {
        throw new CompletionError("Missing API key. Set OPENAI_API_KEY or provide a key for this session.", {
          status: 401,
        });
      }

      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), timeoutMs);
      try {
        const lmResponse = await fetch(apiUrl, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Authorization: `Bearer ${apiKey}`,
          },
          body: JSON.stringify({
            model,
            messages,
            temperature,
            max_tokens: maxTokens,
            stream: false,
          }),
          signal: controller.signal,
        });

        // Solo el JSON inválido cuenta como cuerpo vacío
        const raw: unknown = await lmResponse.json().catch((err: unknown) => {
          if (err instanceof SyntaxError) return null;
          throw err;
        });

        if (!lmResponse.ok) {
          const detail = isLMErrorBody(raw) ? raw.error.message : lmResponse.statusText;
          throw new CompletionError(`Completion service returned ${lmResponse.status}: ${detail}`, {
            status: lmResponse.status,
          });
        }
        if (!isLMResponse(raw)) {
          throw new CompletionError("Unexpected response from the completion service.");
        }

        const content = raw.choices[0]?.message?.content;
        if (typeof content !== "string" || !content.trim()) {
          throw new CompletionError("The completion service returned an empty reply.");
        }
        logger.debug(`🤖 Respuesta del modelo ${model} (${content.length} caracteres)`);
        return content;
      } catch (err) {
        if (err instanceof CompletionError) throw err;
        if (err instanceof Error && err.name === "AbortError") {
          throw new CompletionError(`Completion service timed out after ${timeoutMs} ms.`, { cause: err });
        }
        const reason = err instanceof Error ? err.message : String(err);
        throw new CompletionError(`Could not reach the completion service: ${reason}`, { cause: err });
      } finally {
        clearTimeout(timer);
      }
    },
  };
}
