/**
 * Local model client abstraction. The sidecar speaks an OpenAI-compatible API;
 * the intelligence layer only sees this interface.
 */

import type { LocalModelError } from "../intelligence/errors.js";

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface InvokeRequest {
  modelId: string;
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export interface InvokeUsage {
  promptTokens: number;
  completionTokens: number;
}

export type InvokeResult =
  | { success: true; content: string; usage: InvokeUsage; finishReason?: string }
  | { success: false; error: LocalModelError };

export interface LocalModelInfo {
  id: string;
  ownedBy?: string;
}

export interface LocalModelClient {
  /** Throws TransportError / RemoteError when the sidecar cannot list models. */
  listModels(): Promise<LocalModelInfo[]>;
  /** Never throws for sidecar failures; they come back as { success: false }. */
  invoke(req: InvokeRequest): Promise<InvokeResult>;
}
