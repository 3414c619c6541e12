import path from 'path';
import type { TextGenerator } from '../services/llm/model-client';
import { PROJECT_PROMPTS, TEMPERATURE_SETTINGS, TOKEN_LIMITS, OPERATION_NAMES, SYSTEM_PROMPTS } from '../services/llm';
import { describeModel } from '../types/model';
import { generateProjectPlan } from './PlanGenerator';
import type { PlannedFile } from './PlanGenerator';
import { extractCode, languageForPath, parseInstructions } from '../utils/code-extraction';
import { ensureDirectory, resolveInside, writeTextFile, toPosixPath } from '../utils/file-helpers';
import { UnsafePathError, extractErrorMessage, logError } from '../utils/error-utils';

export interface GenerateProjectOptions {
  description: string;
  technologies?: string[];
  outputDir: string;
}

export interface GenerationResult {
  success: boolean;
  outputDir: string;
  filesCreated: number;
  files: string[];
  failedFiles: string[];
  instructions: string[];
  generationTimeMs: number;
  modelUsed: string;
  usedFallbackPlan: boolean;
  error?: string;
}

export type ProgressListener = (message: string) => void;

function defaultInstructions(outputDir: string, files: string[]): string[] {
  const instructions = [`cd ${outputDir}`];
  if (files.includes('requirements.txt')) instructions.push('pip install -r requirements.txt');
  if (files.includes('package.json')) instructions.push('npm install');
  if (files.includes('main.py')) instructions.push('python main.py');
  return instructions;
}

/**
 * One-shot project generation: plan the files, write each one, then ask for
 * setup instructions
 */
export class ProjectGenerator {
  constructor(
    private readonly generator: TextGenerator,
    private readonly onProgress: ProgressListener = message => console.log(message)
  ) {}

  async generate(options: GenerateProjectOptions): Promise<GenerationResult> {
    const startTime = Date.now();
    const technologies = options.technologies ?? [];
    const outputDir = path.resolve(options.outputDir);
    const files: string[] = [];
    const failedFiles: string[] = [];
    let usedFallbackPlan = false;

    const result = (success: boolean, instructions: string[], error?: string): GenerationResult => ({
      success,
      outputDir,
      filesCreated: files.length,
      files,
      failedFiles,
      instructions,
      generationTimeMs: Date.now() - startTime,
      modelUsed: describeModel(this.generator.info),
      usedFallbackPlan,
      error
    });

    try {
      await ensureDirectory(outputDir);

      this.onProgress(`📋 Planning project with ${describeModel(this.generator.info)}...`);
      const plan = await generateProjectPlan(this.generator, options.description, technologies);
      usedFallbackPlan = plan.usedFallback;
      const plannedPaths = plan.files.map(file => file.path);

      for (const [index, file] of plan.files.entries()) {
        this.onProgress(`📝 [${index + 1}/${plan.files.length}] ${file.path}`);
        const written = await this.generateFile(outputDir, options.description, technologies, file, plannedPaths);
        if (written) {
          files.push(written);
        } else {
          failedFiles.push(file.path);
        }
      }

      if (files.length === 0) {
        return result(false, [], 'No files could be generated');
      }

      const instructions = await this.generateInstructions(options.description, technologies, files, outputDir);
      return result(true, instructions);
    } catch (error) {
      logError(error, 'ProjectGenerator.generate');
      return result(false, [], extractErrorMessage(error));
    }
  }

  private async generateFile(
    outputDir: string,
    description: string,
    technologies: string[],
    file: PlannedFile,
    plannedPaths: string[]
  ): Promise<string | null> {
    let target: string;
    try {
      target = resolveInside(outputDir, file.path);
    } catch (error) {
      if (error instanceof UnsafePathError) {
        console.warn(`⚠️  Skipping ${file.path}: ${error.message}`);
        return null;
      }
      throw error;
    }

    try {
      const response = await this.generator.generate(
        PROJECT_PROMPTS.FILE(description, technologies, file, plannedPaths),
        {
          codeOnly: true,
          temperature: TEMPERATURE_SETTINGS.CODE_GENERATION,
          maxTokens: TOKEN_LIMITS.CODE_GENERATION,
          operation: OPERATION_NAMES.FILE_GENERATION
        }
      );
      const code = extractCode(response, languageForPath(file.path));
      await writeTextFile(target, code.endsWith('\n') ? code : `${code}\n`);
      return toPosixPath(path.relative(outputDir, target));
    } catch (error) {
      logError(error, `ProjectGenerator.generateFile(${file.path})`);
      return null;
    }
  }

  private async generateInstructions(
    description: string,
    technologies: string[],
    files: string[],
    outputDir: string
  ): Promise<string[]> {
    try {
      const response = await this.generator.generate(PROJECT_PROMPTS.INSTRUCTIONS(description, technologies, files), {
        system: SYSTEM_PROMPTS.ASSISTANT,
        temperature: TEMPERATURE_SETTINGS.PLANNING,
        maxTokens: TOKEN_LIMITS.INSTRUCTIONS,
        operation: OPERATION_NAMES.INSTRUCTIONS
      });
      const instructions = parseInstructions(response);
      if (instructions.length > 0) {
        return instructions;
      }
    } catch (error) {
      logError(error, 'ProjectGenerator.generateInstructions');
    }
    return defaultInstructions(outputDir, files);
  }
}
