import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { LIMITS, PYTHON_COMMAND } from '../config/constants';
import { readJsonFile, readTextFile, walkFiles, writeTextFile } from './file-helpers';
import { slugify, truncate } from './text-utils';

const NODE_TECHNOLOGIES = ['node', 'nodejs', 'node.js', 'javascript', 'js', 'typescript', 'ts', 'express'];

// The script `npm init` writes
const DEFAULT_NPM_TEST = 'no test specified';

const PackageScriptsSchema = z.object({
  scripts: z.record(z.string()).optional()
});

export function prefersNode(technologies: string[]): boolean {
  return technologies.some(tech => NODE_TECHNOLOGIES.includes(tech.trim().toLowerCase()));
}

export function isTestCommand(command: string): boolean {
  return /\b(?:pytest|unittest|npm (?:run )?test|jest|vitest|mocha|go test|cargo test)\b/.test(command);
}

/**
 * The command that runs a project's tests, judged by its files, or null
 */
export function detectTestCommand(files: string[]): string | null {
  if (files.some(file => /(?:^|\/)(?:test_[^/]*|[^/]*_test)\.py$/.test(file))) return 'pytest -v';
  if (files.includes('package.json')) return 'npm test';
  if (files.includes('Cargo.toml')) return 'cargo test';
  if (files.includes('go.mod')) return 'go test ./...';
  return null;
}

interface TreeNode {
  name: string;
  // null for files
  children: Map<string, TreeNode> | null;
}

const byTreeOrder = (a: TreeNode, b: TreeNode): number => {
  if (Boolean(a.children) !== Boolean(b.children)) return a.children ? -1 : 1;
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
};

/**
 * Draw posix relative paths as a tree, directories first
 */
export function formatTree(files: string[]): string[] {
  const root = new Map<string, TreeNode>();
  for (const file of files) {
    const parts = file.split('/').filter(Boolean);
    let level = root;
    parts.forEach((part, index) => {
      let node = level.get(part);
      if (!node) {
        node = { name: part, children: index === parts.length - 1 ? null : new Map() };
        level.set(part, node);
      }
      if (node.children) level = node.children;
    });
  }

  const lines: string[] = [];
  const render = (level: Map<string, TreeNode>, prefix: string): void => {
    const nodes = [...level.values()].sort(byTreeOrder);
    nodes.forEach((node, index) => {
      const last = index === nodes.length - 1;
      lines.push(`${prefix}${last ? '└── ' : '├── '}${node.name}${node.children ? '/' : ''}`);
      if (node.children) render(node.children, `${prefix}${last ? '    ' : '│   '}`);
    });
  };
  render(root, '');
  return lines;
}

// "create minimal scaffold", "Set up a minimal project", ...
export function isScaffoldStep(step: string): boolean {
  return /^(?:create|set up|setup|initiali[sz]e)\s+(?:an?\s+|the\s+)?minimal\b/i.test(step.trim());
}

/**
 * Write a runnable hello-world project so the first build step has
 * something to run. Returns the files written.
 */
export async function scaffoldProject(rootDir: string, description: string, technologies: string[]): Promise<string[]> {
  const title = truncate(description.split('\n')[0].trim(), 60, '...');
  const files: Record<string, string> = {
    'README.md': `# ${title}\n\n${description.trim()}\n`
  };

  if (prefersNode(technologies)) {
    files['index.js'] = "console.log('Hello, world!');\n";
    files['package.json'] = JSON.stringify(
      {
        name: slugify(description),
        version: '0.1.0',
        private: true,
        main: 'index.js',
        scripts: {
          start: 'node index.js',
          test: `echo "Error: ${DEFAULT_NPM_TEST}" && exit 1`
        }
      },
      null,
      2
    ) + '\n';
  } else {
    files['main.py'] = 'def main():\n    print("Hello, world!")\n\n\nif __name__ == "__main__":\n    main()\n';
  }

  for (const [name, content] of Object.entries(files)) {
    await writeTextFile(path.join(rootDir, name), content);
  }
  return Object.keys(files).sort();
}

/**
 * Pick the command that checks the project: its tests when it has any,
 * otherwise its entry point
 */
export async function inferRunCommand(rootDir: string, technologies: string[] = []): Promise<string> {
  const files = await walkFiles(rootDir, { maxDepth: 3 });

  if (files.some(file => /^(?:tests\/)?test_[^/]*\.py$/.test(file))) {
    return 'pytest -q';
  }

  const scripts = files.includes('package.json')
    ? (await readJsonFile(path.join(rootDir, 'package.json'), PackageScriptsSchema, {})).scripts ?? {}
    : {};
  if (scripts.test && !scripts.test.includes(DEFAULT_NPM_TEST)) {
    return 'npm test';
  }

  for (const entry of ['main.py', 'hello.py', 'app.py']) {
    if (files.includes(entry)) {
      return `${PYTHON_COMMAND} ${entry}`;
    }
  }
  if (scripts.start) {
    return 'npm start';
  }
  if (files.includes('index.js')) {
    return 'node index.js';
  }

  const firstPython = files.find(file => file.endsWith('.py'));
  if (firstPython) {
    return `${PYTHON_COMMAND} ${firstPython}`;
  }
  return prefersNode(technologies) ? 'node index.js' : `${PYTHON_COMMAND} main.py`;
}

/**
 * One line per small project file: `path | first non-empty line`
 */
export async function summarizeProject(rootDir: string): Promise<string> {
  const files = (await walkFiles(rootDir)).slice(0, LIMITS.CONTEXT_FILES);
  const lines: string[] = [];

  for (const file of files) {
    const absolute = path.join(rootDir, file);
    const stats = await fs.stat(absolute);
    if (stats.size >= LIMITS.CONTEXT_FILE_MAX_BYTES) {
      lines.push(`${file} | (large file, ${stats.size} bytes)`);
      continue;
    }
    const content = (await readTextFile(absolute)) ?? '';
    const firstLine = content.split('\n').find(line => line.trim().length > 0) ?? '';
    lines.push(`${file} | ${truncate(firstLine.trim(), 120)}`);
  }

  return lines.length > 0 ? lines.join('\n') : '(empty project)';
}
