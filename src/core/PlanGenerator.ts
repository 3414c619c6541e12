import { z } from 'zod';
import type { TextGenerator } from '../services/llm/model-client';
import {
  SYSTEM_PROMPTS,
  PROJECT_PROMPTS,
  BUILD_PROMPTS,
  TEMPERATURE_SETTINGS,
  TOKEN_LIMITS,
  OPERATION_NAMES
} from '../services/llm';
import { extractJson, parsePlanLines } from '../utils/code-extraction';
import { logError } from '../utils/error-utils';

export interface PlannedFile {
  path: string;
  description: string;
}

export const FALLBACK_STEPS = [
  'create minimal scaffold',
  'add core logic',
  'add basic tests',
  'handle errors',
  'improve documentation'
];

const ProjectPlanSchema = z.object({
  files: z
    .array(
      z.object({
        path: z.string().min(1),
        description: z.string().optional()
      })
    )
    .min(1)
});

/**
 * Plan used when the model's answer cannot be parsed
 */
export function fallbackProjectPlan(description: string, technologies: string[]): PlannedFile[] {
  const techs = technologies.map(tech => tech.toLowerCase());
  const files: PlannedFile[] = [
    { path: 'README.md', description: `Overview and usage for: ${description}` },
    { path: 'requirements.txt', description: 'Python dependencies' },
    { path: 'main.py', description: 'Program entry point' }
  ];

  if (techs.includes('fastapi')) {
    files.push(
      { path: 'app.py', description: 'FastAPI application and routes' },
      { path: 'models.py', description: 'Pydantic models' }
    );
  }
  if (techs.includes('react')) {
    files.push(
      { path: 'package.json', description: 'Node package manifest for the React frontend' },
      { path: 'src/App.js', description: 'Root React component' }
    );
  }
  return files;
}

export function parseProjectPlan(response: string): PlannedFile[] | null {
  const json = extractJson(response, 'object');
  if (!json) {
    return null;
  }

  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch {
    return null;
  }

  const parsed = ProjectPlanSchema.safeParse(data);
  if (!parsed.success) {
    return null;
  }
  return parsed.data.files.map(file => ({ path: file.path.trim(), description: file.description ?? '' }));
}

/**
 * Ask the model which files a project needs
 */
export async function generateProjectPlan(
  generator: TextGenerator,
  description: string,
  technologies: string[]
): Promise<{ files: PlannedFile[]; usedFallback: boolean }> {
  try {
    const response = await generator.generate(PROJECT_PROMPTS.PLAN(description, technologies), {
      system: SYSTEM_PROMPTS.ASSISTANT,
      temperature: TEMPERATURE_SETTINGS.PLANNING,
      maxTokens: TOKEN_LIMITS.PLANNING,
      operation: OPERATION_NAMES.PROJECT_PLAN
    });

    const files = parseProjectPlan(response);
    if (files) {
      return { files, usedFallback: false };
    }
    console.warn('Could not parse the project plan, using the default file layout');
  } catch (error) {
    logError(error, 'generateProjectPlan');
  }
  return { files: fallbackProjectPlan(description, technologies), usedFallback: true };
}

/**
 * Ask the model for incremental build steps, one per line
 */
export async function generateBuildSteps(
  generator: TextGenerator,
  description: string,
  technologies: string[],
  maxSteps: number
): Promise<string[]> {
  try {
    const response = await generator.generate(BUILD_PROMPTS.PLAN_STEPS(description, technologies, maxSteps), {
      system: SYSTEM_PROMPTS.PLANNER,
      temperature: TEMPERATURE_SETTINGS.PLANNING,
      maxTokens: TOKEN_LIMITS.PLANNING,
      operation: OPERATION_NAMES.STEP_PLANNING
    });

    const steps = parsePlanLines(response, maxSteps);
    if (steps.length > 0) {
      return steps;
    }
    console.warn('Step plan was empty, using the default steps');
  } catch (error) {
    logError(error, 'generateBuildSteps');
  }
  return FALLBACK_STEPS.slice(0, maxSteps);
}
