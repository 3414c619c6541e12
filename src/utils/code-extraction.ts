/**
 * Helpers for pulling code, JSON and structured directives out of model responses
 */
import path from 'path';
import { z } from 'zod';
import type { FileChange } from '../types/build';
import { LIMITS } from '../config/constants';

export interface CodeBlock {
  language: string;
  code: string;
}

export type ShellDirective =
  | { type: 'mkdir'; path: string }
  | { type: 'file'; path: string; content: string }
  | { type: 'run'; command: string };

const EXTENSION_LANGUAGES: Record<string, string> = {
  '.py': 'python',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.c': 'c',
  '.h': 'c',
  '.cc': 'cpp',
  '.cpp': 'cpp',
  '.cxx': 'cpp',
  '.hpp': 'cpp',
  '.java': 'java',
  '.rs': 'rust',
  '.go': 'go',
  '.sh': 'bash',
  '.html': 'html',
  '.css': 'css',
  '.json': 'json',
  '.md': 'markdown',
  '.yml': 'yaml',
  '.yaml': 'yaml',
  '.toml': 'toml',
  '.sql': 'sql',
  '.txt': 'text'
};

const LANGUAGE_TAGS: Record<string, string[]> = {
  python: ['python', 'py', 'python3'],
  javascript: ['javascript', 'js', 'jsx', 'node', 'mjs'],
  typescript: ['typescript', 'ts', 'tsx'],
  c: ['c', 'h'],
  cpp: ['cpp', 'c++', 'cc', 'cxx', 'hpp'],
  java: ['java'],
  rust: ['rust', 'rs'],
  go: ['go', 'golang'],
  bash: ['bash', 'sh', 'shell'],
  markdown: ['markdown', 'md'],
  yaml: ['yaml', 'yml'],
  text: ['text', 'txt', 'plaintext']
};

const FENCE_PATTERN = /```([\w+#.-]*)[^\n]*\n([\s\S]*?)```/g;

const CODE_LINE_PATTERN = /^\s*(?:import\s|from\s\S+\s+import|def\s|class\s|function\s|const\s|let\s|var\s|#include|#!|package\s|public\s|private\s|fn\s|use\s|func\s|async\s|export\s|module\.exports|require\(|if\s*\(|if\s|for\s|while\s|return\b|print\(|console\.|@\w+|int\s+main|"use strict")/;

const NARRATIVE_PATTERN = /^\s*(?:EXPLANATION:|Explanation:|NOTE:|Note:|This (?:fix|code|change)|The (?:fix|code|change|error)|I (?:have|fixed|changed))/;

export function languageForPath(filePath: string): string | null {
  return EXTENSION_LANGUAGES[path.extname(filePath).toLowerCase()] ?? null;
}

export function isSupportedSourceFile(filePath: string): boolean {
  const language = languageForPath(filePath);
  return language !== null && ['python', 'javascript', 'typescript', 'c', 'cpp', 'java', 'rust', 'go'].includes(language);
}

function tagMatchesLanguage(tag: string, language: string): boolean {
  const normalized = language.toLowerCase();
  const tags = LANGUAGE_TAGS[normalized] ?? [normalized];
  return tags.includes(tag.toLowerCase());
}

function largest(blocks: CodeBlock[]): CodeBlock {
  return blocks.reduce((best, block) => (block.code.length > best.code.length ? block : best));
}

export function extractCodeBlocks(response: string): CodeBlock[] {
  const blocks: CodeBlock[] = [];
  for (const match of response.matchAll(FENCE_PATTERN)) {
    blocks.push({
      language: match[1].toLowerCase(),
      code: match[2].replace(/\s+$/, '')
    });
  }
  return blocks;
}

/**
 * Return the code of a response: the largest fenced block in the requested
 * language, else the largest fenced block, else the trimmed response itself.
 */
export function extractCode(response: string, language?: string | null): string {
  const blocks = extractCodeBlocks(response);
  if (blocks.length === 0) {
    return response.trim();
  }

  if (language) {
    const tagged = blocks.filter(block => tagMatchesLanguage(block.language, language));
    if (tagged.length > 0) {
      return largest(tagged).code;
    }
  }
  return largest(blocks).code;
}

/**
 * Find the JSON payload in a response: a ```json fence, any fence holding JSON,
 * or the outermost bracketed span.
 */
export function extractJson(response: string, kind: 'object' | 'array' = 'object'): string | null {
  const [open, close] = kind === 'object' ? ['{', '}'] : ['[', ']'];

  const jsonFence = /```json[^\n]*\n([\s\S]*?)```/i.exec(response);
  if (jsonFence) {
    return jsonFence[1].trim();
  }

  for (const block of extractCodeBlocks(response)) {
    const trimmed = block.code.trim();
    if (trimmed.startsWith(open) && trimmed.endsWith(close)) {
      return trimmed;
    }
  }

  const start = response.indexOf(open);
  const end = response.lastIndexOf(close);
  if (start !== -1 && end > start) {
    return response.slice(start, end + 1);
  }
  return null;
}

/**
 * Pull replacement source out of a fix response. Returns null when the
 * response carries no code at all.
 */
export function extractFixedCode(response: string, language?: string | null): string | null {
  const marked = /FIXED_CODE:\s*```[^\n]*\n([\s\S]*?)```/.exec(response);
  if (marked && marked[1].trim()) {
    return marked[1].replace(/\s+$/, '');
  }

  const blocks = extractCodeBlocks(response).filter(block => block.code.trim().length > 0);
  if (language) {
    const tagged = blocks.filter(block => tagMatchesLanguage(block.language, language));
    if (tagged.length > 0) {
      return largest(tagged).code;
    }
  }
  if (blocks.length > 0) {
    return largest(blocks).code;
  }

  const lines = response.split('\n');
  const start = lines.findIndex(line => CODE_LINE_PATTERN.test(line));
  if (start === -1) {
    return null;
  }

  const codeLines: string[] = [];
  for (const line of lines.slice(start)) {
    if (NARRATIVE_PATTERN.test(line)) break;
    codeLines.push(line);
  }
  const code = codeLines.join('\n').replace(/\s+$/, '');
  return code.length > 0 ? code : null;
}

export function extractExplanation(response: string): string | null {
  const match = /EXPLANATION:\s*([\s\S]*?)(?:\n\s*\n|FIXED_CODE:|```|$)/.exec(response);
  const explanation = match?.[1].trim();
  return explanation ? explanation : null;
}

// Turn a numbered or bulleted list into plain instruction lines
export function parseInstructions(response: string, limit: number = LIMITS.MAX_INSTRUCTIONS): string[] {
  return response
    .split('\n')
    .map(line => line.replace(/^\s*(?:\d+[.)]|[-*•])\s*/, '').trim())
    .filter(line => line.length > 10 && !line.startsWith('```'))
    .slice(0, limit);
}

/**
 * One plan step per line. Bullets and numbering are stripped, lines outside
 * 2 to 14 words are dropped and duplicates removed case-insensitively.
 */
export function parsePlanLines(raw: string, maxSteps: number): string[] {
  const seen = new Set<string>();
  const steps: string[] = [];

  for (const line of raw.split('\n')) {
    const step = line
      .replace(/^\s*(?:[-*•]\s*|\d+[.)]\s*|step\s+\d+[:.)]\s*)*/i, '')
      .replace(/\*\*/g, '')
      .trim();
    const words = step.split(/\s+/).filter(Boolean);
    if (words.length < 2 || words.length > 14) continue;

    const key = step.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    steps.push(step);
    if (steps.length >= maxSteps) break;
  }
  return steps;
}

const FileChangeSchema = z.union([
  z.object({ path: z.string().min(1), code: z.string() }),
  z.object({ path: z.string().min(1), diff: z.string().min(1) })
]);

const ChangeEnvelopeSchema = z.object({
  files: z.array(z.unknown()).optional(),
  changes: z.array(z.unknown()).optional()
});

/**
 * Parse the JSON array of file changes a build step asks for.
 * Entries that are not {path, code} or {path, diff} are dropped.
 */
export function parseFileChanges(raw: string): FileChange[] {
  const payload = extractJson(raw, 'array') ?? extractJson(raw, 'object');
  if (!payload) {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch (error) {
    console.warn(`Could not parse file changes: ${error instanceof Error ? error.message : String(error)}`);
    return [];
  }

  let entries: unknown[] = [];
  if (Array.isArray(parsed)) {
    entries = parsed;
  } else {
    const envelope = ChangeEnvelopeSchema.safeParse(parsed);
    if (envelope.success) {
      entries = envelope.data.files ?? envelope.data.changes ?? [];
    }
  }

  const changes: FileChange[] = [];
  for (const entry of entries) {
    const result = FileChangeSchema.safeParse(entry);
    if (result.success) {
      changes.push(result.data);
    }
  }
  return changes;
}

function cleanDirectiveTarget(value: string): string {
  return value.trim().replace(/^[`'"]+|[`'":]+$/g, '').trim();
}

/**
 * Read CREATE DIR, CREATE FILE (followed by a fenced block) and RUN COMMAND:
 * directives from a chat reply, in order.
 */
export function parseShellDirectives(response: string): ShellDirective[] {
  const directives: ShellDirective[] = [];
  const lines = response.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();

    const dir = /^CREATE DIR(?:ECTORY)?:?\s+(.+)$/i.exec(line);
    if (dir) {
      directives.push({ type: 'mkdir', path: cleanDirectiveTarget(dir[1]) });
      continue;
    }

    const file = /^CREATE FILE:?\s+(.+)$/i.exec(line);
    if (file) {
      let j = i + 1;
      while (j < lines.length && !lines[j].trim().startsWith('```')) j++;
      if (j >= lines.length) continue;

      const body: string[] = [];
      let k = j + 1;
      while (k < lines.length && !lines[k].trim().startsWith('```')) {
        body.push(lines[k]);
        k++;
      }
      directives.push({
        type: 'file',
        path: cleanDirectiveTarget(file[1]),
        content: body.length > 0 ? body.join('\n') + '\n' : ''
      });
      i = k;
      continue;
    }

    const run = /^RUN COMMAND:\s*(.+)$/i.exec(line);
    if (run) {
      directives.push({ type: 'run', command: run[1].trim().replace(/^`+|`+$/g, '') });
    }
  }
  return directives;
}
