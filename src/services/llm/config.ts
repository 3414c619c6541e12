/**
 * Centralized LLM configuration settings and defaults
 */
import preferences from '../../config/model-preferences.json';
import { DEFAULT_OLLAMA_URL } from '../../config/constants';

// Default models by provider and cloud tier
export const DEFAULT_MODELS = {
  CLOUD_FAST: process.env.AGENTSTEAM_FAST_MODEL || preferences.cloud.fast,
  CLOUD_BALANCED: process.env.AGENTSTEAM_BALANCED_MODEL || preferences.cloud.balanced,
  CLOUD_POWERFUL: process.env.AGENTSTEAM_POWERFUL_MODEL || preferences.cloud.powerful,
  ANTHROPIC_DEFAULT: process.env.AGENTSTEAM_ANTHROPIC_MODEL || preferences.anthropic
};

// Provider defaults and settings
export const PROVIDER_CONFIG = {
  OLLAMA: {
    DEFAULT_BASE_URL: DEFAULT_OLLAMA_URL,
    // The OpenAI SDK requires a key; Ollama ignores it
    API_KEY_PLACEHOLDER: 'ollama'
  },
  OPENAI: {
    API_BASE_URL: process.env.OPENAI_API_BASE || undefined,
    ORGANIZATION_ID: process.env.OPENAI_ORGANIZATION_ID || undefined
  },
  ANTHROPIC: {
    API_BASE_URL: process.env.ANTHROPIC_API_BASE || undefined
  }
};

// Temperature settings for different tasks
export const TEMPERATURE_SETTINGS = {
  CODE_GENERATION: parseFloat(process.env.CODE_TEMPERATURE || '0.1'),
  PLANNING: parseFloat(process.env.PLAN_TEMPERATURE || '0.2'),
  FIX: parseFloat(process.env.FIX_TEMPERATURE || '0.1'),
  CHAT: parseFloat(process.env.CHAT_TEMPERATURE || '0.7')
};

export const DEFAULT_TOP_P = parseFloat(process.env.LLM_TOP_P || '0.9');

// Token limits for different tasks
export const TOKEN_LIMITS = {
  CODE_GENERATION: parseInt(process.env.CODE_MAX_TOKENS || '4000'),
  PLANNING: parseInt(process.env.PLAN_MAX_TOKENS || '1000'),
  FIX: parseInt(process.env.FIX_MAX_TOKENS || '4000'),
  CHAT: parseInt(process.env.CHAT_MAX_TOKENS || '2000'),
  INSTRUCTIONS: parseInt(process.env.INSTRUCTIONS_MAX_TOKENS || '600')
};

export const REQUEST_TIMEOUTS = {
  COMPLETION_MS: parseInt(process.env.LLM_TIMEOUT_MS || '300000'),
  MODEL_LIST_MS: parseInt(process.env.OLLAMA_LIST_TIMEOUT_MS || '5000')
};

// Operation names for tracking and logging
export const OPERATION_NAMES = {
  PROJECT_PLAN: 'plan_project',
  FILE_GENERATION: 'generate_file',
  INSTRUCTIONS: 'generate_instructions',
  STEP_PLANNING: 'plan_steps',
  STEP_CHANGES: 'generate_step_changes',
  CODE_FIX: 'fix_code',
  CHAT: 'chat',
  EXPLAIN: 'explain_code',
  ANALYZE: 'analyze_code'
};
