/**
 * Application constants
 */

export const DEFAULT_MAX_LISTENERS = 20;

export const CONFIG_DIR_NAME = '.agentsteam';
export const CONFIG_FILE_NAME = 'config.json';
export const STATE_FILE_NAME = '.agentsteam_state.json';
export const PROJECT_WORK_DIR = '.agentsteam';
export const DEFAULT_OLLAMA_URL = 'http://localhost:11434';
export const DEFAULT_OLLAMA_PORT = '11434';
export const DEFAULT_OUTPUT_DIR = './generated';

export const PYTHON_COMMAND = process.env.AGENTSTEAM_PYTHON || 'python3';

/**
 * Limits used by the incremental builder and the error corrector
 */
export const LIMITS = {
  MAX_STEPS: 8,
  MAX_FIX_ATTEMPTS: 3,
  MAX_STEP_RETRIES: 1,
  STAGNATION_LIMIT: 2,
  CONTEXT_FILES: 15,
  CONTEXT_FILE_MAX_BYTES: 8000,
  DIFF_MAX_LINES: 120,
  RECENT_DIFFS: 3,
  STATE_STDOUT_TAIL: 1000,
  STATE_STDERR_TAIL: 2000,
  INTROSPECTION_STDERR_TAIL: 800,
  INTROSPECTION_STDOUT_TAIL: 400,
  NEGATIVE_MEMORY_SIZE: 50,
  NEGATIVE_MEMORY_THRESHOLD: 0.9,
  COMMAND_TIMEOUT_MS: parseInt(process.env.AGENTSTEAM_COMMAND_TIMEOUT || '120000'),
  MAX_INSTRUCTIONS: 6,
  CHAT_HISTORY: 4,
  // Shell file tools
  TREE_DEPTH: 4,
  READ_FILES: 5,
  ANALYZE_FILES: 3,
  FIND_MATCHES: 20,
  PROMPT_FILE_CHARS: 8000,
};

/**
 * Step status constants
 */
export const STEP_STATUS = {
  PENDING: 'pending',
  IN_PROGRESS: 'in_progress',
  COMPLETED: 'completed',
  FAILED: 'failed',
  SKIPPED: 'skipped',
} as const;

/**
 * Event types
 */
export const EVENTS = {
  BUILD: {
    PLAN_CREATED: 'build:plan-created',
    STAGNATION: 'build:stagnation',
    COMPLETED: 'build:completed',
    FAILED: 'build:failed',
  },
  STEP: {
    STARTED: 'step:started',
    SKIPPED: 'step:skipped',
    CHANGES_APPLIED: 'step:changes-applied',
    RUN_COMPLETED: 'step:run-completed',
    FIX_ATTEMPT: 'step:fix-attempt',
    ROLLED_BACK: 'step:rolled-back',
    RETRY: 'step:retry',
    COMPLETED: 'step:completed',
    FAILED: 'step:failed',
  },
} as const;
