/**
 * Centralized storage for all prompts used in the application
 */

// System prompts
export const SYSTEM_PROMPTS = {
  ASSISTANT: 'You are a senior software engineer who writes working, idiomatic code and explains it briefly.',
  CODE_ONLY: 'You write source code only. Reply with the complete contents of the requested file inside a single fenced code block. No explanations, no commentary before or after the block.',
  PLANNER: 'You break software projects into small, verifiable implementation steps. Reply with one short imperative step per line and nothing else.',
  BUILDER: 'You implement one step of a software project at a time. Reply only with a JSON array of file changes. Each element is {"path": "relative/path", "code": "full file contents"} or {"path": "relative/path", "diff": "unified diff"}.',
  FIXER: 'You are an expert debugger. Given source code and an error, you return the corrected complete file.',
  SHELL: 'You are a coding assistant inside a terminal. When the user wants files or commands, use these directives on their own lines: "CREATE DIR path", "CREATE FILE path" followed by a fenced code block with the full contents, and "RUN COMMAND: command".'
};

const formatTechnologies = (technologies: string[]): string =>
  technologies.length > 0 ? technologies.join(', ') : 'choose suitable technologies';

// One-shot project generation
export const PROJECT_PROMPTS = {
  PLAN: (description: string, technologies: string[]) => `Plan the files for this project.

Project: ${description}
Technologies: ${formatTechnologies(technologies)}

Reply with JSON only, in this shape:
{"files": [{"path": "relative/path.ext", "description": "what this file contains"}]}

Keep the project small and runnable. Include a README.md.`,

  FILE: (description: string, technologies: string[], file: { path: string; description: string }, allFiles: string[]) => `Write the file "${file.path}" for this project.

Project: ${description}
Technologies: ${formatTechnologies(technologies)}
Purpose of this file: ${file.description || 'see project description'}
Other files in the project: ${allFiles.filter(p => p !== file.path).join(', ') || 'none'}

Return the complete file contents.`,

  INSTRUCTIONS: (description: string, technologies: string[], files: string[]) => `Give short setup and run instructions for this project.

Project: ${description}
Technologies: ${formatTechnologies(technologies)}
Files: ${files.join(', ')}

Reply with a numbered list of at most 6 steps.`
};

// Incremental try-error builder
export const BUILD_PROMPTS = {
  PLAN_STEPS: (description: string, technologies: string[], maxSteps: number) => `Split this project into at most ${maxSteps} incremental implementation steps.
Each step must leave the project runnable. The first step creates a minimal scaffold.

Project: ${description}
Technologies: ${formatTechnologies(technologies)}

One step per line, 2 to 14 words each, no numbering.`,

  STEP_CHANGES: (params: {
    description: string;
    technologies: string[];
    step: string;
    stepNumber: number;
    totalSteps: number;
    runCommand: string;
    expect?: string;
    contextSummary: string;
    introspection: string;
  }) => `Project: ${params.description}
Technologies: ${formatTechnologies(params.technologies)}
Current step (${params.stepNumber}/${params.totalSteps}): ${params.step}
The project is checked by running: ${params.runCommand}${params.expect ? `\nIts output must contain: ${params.expect}` : ''}

Current files:
${params.contextSummary}

Previous attempts:
${params.introspection}

Make the smallest set of changes that implements the current step and keeps the run command passing.
Reply with a JSON array only:
[{"path": "relative/path", "code": "complete new file contents"}]
For a small edit to a large existing file you may use {"path": "...", "diff": "unified diff"} instead.`
};

// Error correction
export const FIX_PROMPTS = {
  PRIMARY: (code: string, errorMessage: string, language: string, filePath: string) => `Fix the error in this ${language} file.

File: ${filePath}
Error:
${errorMessage}

Current code:
\`\`\`${language}
${code}
\`\`\`

Reply in this format:
EXPLANATION: one or two sentences about the cause
FIXED_CODE:
\`\`\`${language}
complete corrected file
\`\`\``,

  STRICT: (code: string, errorMessage: string, language: string) => `The previous answer did not contain usable code.
Return ONLY the complete corrected ${language} file in one fenced code block.

Error:
${errorMessage}

Code:
\`\`\`${language}
${code}
\`\`\``
};

// Interactive shell
export const SHELL_PROMPTS = {
  CHAT: (message: string, cwd: string, history: string) => `Working directory: ${cwd}
${history ? `Recent conversation:\n${history}\n` : ''}
User: ${message}`,

  EXPLAIN: (filePath: string, code: string, language: string, focus?: string) => `Explain what this ${language} file does${
    focus ? `, focusing on: ${focus}` : ''
  }.

File: ${filePath}
\`\`\`${language}
${code}
\`\`\`

Describe its purpose, its main parts and how they fit together. Keep it short.`,

  ANALYZE: (filePath: string, code: string, language: string) => `Review this ${language} file.

File: ${filePath}
\`\`\`${language}
${code}
\`\`\`

List bugs, risky constructs and likely runtime errors first, then up to three concrete improvements.
Answer "No issues found" when there is nothing worth changing.`
};
