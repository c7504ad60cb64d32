import type { ProviderKind } from "../config/env.js";
import type { ChatProvider } from "./ChatProvider.js";
import { AnthropicProvider } from "./AnthropicProvider.js";
import { PerplexityProvider } from "./PerplexityProvider.js";

export function createChatProvider(
  kind: ProviderKind,
  apiKey: string,
  model: string,
  timeoutMs: number
): ChatProvider {
  if (kind === "anthropic") return new AnthropicProvider(apiKey, model || undefined, timeoutMs);
  return new PerplexityProvider(apiKey, model || undefined, timeoutMs);
}
