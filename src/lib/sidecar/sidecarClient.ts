/**
 * Sidecar client using the OpenAI SDK against the local OpenAI-compatible endpoint.
 * Retries are disabled: the harness records each attempt exactly once.
 */

import OpenAI from "openai";
import { RemoteError, TransportError, type LocalModelError } from "../intelligence/errors.js";
import { getSidecarConfig, type SidecarConfig } from "../intelligence/config.js";
import type { ChatMessage, InvokeRequest, InvokeResult, LocalModelClient, LocalModelInfo } from "./types.js";

/** Sidecar ignores the key, but the SDK requires one. */
const PLACEHOLDER_API_KEY = "sidecar-local";

export function sidecarBaseUrl(config: Pick<SidecarConfig, "host" | "port">): string {
  return `http://${config.host}:${config.port}/v1`;
}

export function toLocalModelError(error: unknown, context: string): LocalModelError {
  if (error instanceof OpenAI.APIConnectionError) {
    return new TransportError(`${context}: ${error.message}`, {
      timeout: error instanceof OpenAI.APIConnectionTimeoutError,
    });
  }
  if (error instanceof OpenAI.APIError) {
    return new RemoteError(error.status, `${context}: ${error.message}`);
  }
  return new TransportError(`${context}: ${error instanceof Error ? error.message : String(error)}`);
}

function toChatParam(message: ChatMessage): OpenAI.Chat.Completions.ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    default:
      return { role: "user", content: message.content };
  }
}

/** Message text, falling back to the `reasoning` field some local servers emit. */
function extractContent(message: OpenAI.Chat.Completions.ChatCompletionMessage | undefined): string {
  if (!message) return "";
  if (message.content) return message.content;
  if ("reasoning" in message && typeof message.reasoning === "string") {
    return message.reasoning;
  }
  return "";
}

export class SidecarClient implements LocalModelClient {
  private readonly client: OpenAI;
  readonly baseURL: string;

  constructor(config: SidecarConfig = getSidecarConfig()) {
    this.baseURL = sidecarBaseUrl(config);
    this.client = new OpenAI({
      apiKey: PLACEHOLDER_API_KEY,
      baseURL: this.baseURL,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
  }

  async listModels(): Promise<LocalModelInfo[]> {
    try {
      const page = await this.client.models.list();
      return page.data.map((m) => ({ id: m.id, ...(m.owned_by && { ownedBy: m.owned_by }) }));
    } catch (error) {
      throw toLocalModelError(error, "List models failed");
    }
  }

  async invoke(req: InvokeRequest): Promise<InvokeResult> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: req.modelId,
          messages: req.messages.map(toChatParam),
          temperature: req.temperature,
          max_tokens: req.maxTokens,
          stream: false,
        },
        { timeout: req.timeoutMs }
      );
      const choice = response.choices[0];
      return {
        success: true,
        content: extractContent(choice?.message),
        usage: {
          promptTokens: response.usage?.prompt_tokens ?? 0,
          completionTokens: response.usage?.completion_tokens ?? 0,
        },
        ...(choice?.finish_reason && { finishReason: choice.finish_reason }),
      };
    } catch (error) {
      return { success: false, error: toLocalModelError(error, `Chat completion failed for ${req.modelId}`) };
    }
  }
}
