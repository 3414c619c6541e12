/**
 * Common types for LLM services
 */
import type { Provider } from '../../types/model';

// Base message type used across all providers
export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

// Common token usage interface
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

// Common pricing interface
export interface ModelPricing {
  input: number;  // Cost per 1K tokens for input
  output: number; // Cost per 1K tokens for output
}

// Model configuration interface
export interface ModelConfig {
  model: string;
  temperature?: number;
  topP?: number;
  maxTokens?: number;
}

// Request context for logging
export interface RequestContext {
  operation?: string;
  step?: string;
  [key: string]: string | undefined;
}

// Chat completion response
export interface LLMChatCompletionResponse {
  content: string;
  tokenUsage: TokenUsage;
  model: string;
  provider: Provider;
  durationMs: number;
  finishReason?: string;
}

// Execution options extending model config
export interface ExecutionOptions extends ModelConfig {
  provider: Provider;
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
}
