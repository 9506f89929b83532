/**
 * Workspace discovery and project configuration.
 */

import { execSync } from 'node:child_process';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as YAML from 'yaml';
import { FileSystemError, InputError, isErrnoException } from '../errors.js';
import { ProjectConfigSchema, type ProjectConfig } from '../schema/index.js';
import { errors } from '../strings/index.js';
import { ARCHIVE_DIR, CHANGES_DIR, DocumentStore, SPECS_DIR } from './document-store.js';

export const WORKSPACE_DIR = 'openspec';
export const CONFIG_FILE = 'config.yaml';

export interface SpeclaneContext {
  /** Directory containing the workspace */
  rootDir: string;
  /** The workspace itself (`<root>/openspec`) */
  workspaceDir: string;
  configPath: string | null;
  config: ProjectConfig;
  store: DocumentStore;
}

export interface ContextOptions {
  /** Workspace directory; skips the upward search */
  workspace?: string;
  /** Where the upward search starts (default: cwd) */
  cwd?: string;
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch (err) {
    if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
      return false;
    }
    throw new FileSystemError('stat', dir, err);
  }
}

/**
 * Walk up from startDir looking for an `openspec/` directory
 */
export async function findWorkspace(startDir: string): Promise<string | null> {
  let dir = path.resolve(startDir);

  while (true) {
    const candidate = path.join(dir, WORKSPACE_DIR);
    if (await isDirectory(candidate)) {
      return candidate;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Read `config.yaml` from a workspace. A missing file yields defaults.
 */
export async function loadConfig(
  workspaceDir: string
): Promise<{ config: ProjectConfig; path: string | null }> {
  const file = path.join(workspaceDir, CONFIG_FILE);
  let content: string;
  try {
    content = await fs.readFile(file, 'utf-8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      return { config: ProjectConfigSchema.parse({}), path: null };
    }
    throw new FileSystemError('read', file, err);
  }

  let raw: unknown;
  try {
    // An empty file parses to null
    raw = YAML.parse(content) ?? {};
  } catch (err) {
    throw new InputError(
      errors.project.invalidConfig(file, err instanceof Error ? err.message : String(err)),
      'INVALID_CONFIG'
    );
  }

  const result = ProjectConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new InputError(errors.project.invalidConfig(file, issues), 'INVALID_CONFIG');
  }
  return { config: result.data, path: file };
}

/**
 * Locate the workspace and load its configuration
 */
export async function initContext(options: ContextOptions = {}): Promise<SpeclaneContext> {
  const workspaceDir = options.workspace
    ? path.resolve(options.workspace)
    : await findWorkspace(options.cwd ?? process.cwd());

  if (!workspaceDir || !(await isDirectory(workspaceDir))) {
    throw new InputError(errors.project.noWorkspace, 'NO_WORKSPACE', errors.project.initHint);
  }

  const { config, path: configPath } = await loadConfig(workspaceDir);
  return {
    rootDir: path.dirname(workspaceDir),
    workspaceDir,
    configPath,
    config,
    store: new DocumentStore(workspaceDir),
  };
}

const CONFIG_TEMPLATE = `# speclane configuration
#
# verbs: extra verbs allowed as the first word of a change id
# strict: treat warnings as errors for every validate
# author: default author for new proposals
verbs: []
strict: false
`;

/**
 * Create `openspec/` with its changes, specs and archive directories
 */
export async function initWorkspace(rootDir: string): Promise<string> {
  const workspaceDir = path.join(path.resolve(rootDir), WORKSPACE_DIR);
  if (await isDirectory(workspaceDir)) {
    throw new InputError(errors.project.alreadyInitialized(workspaceDir), 'ALREADY_INITIALIZED');
  }

  const store = new DocumentStore(workspaceDir);
  for (const dir of [CHANGES_DIR, SPECS_DIR, ARCHIVE_DIR]) {
    const full = path.join(workspaceDir, dir);
    try {
      await fs.mkdir(full, { recursive: true });
    } catch (err) {
      throw new FileSystemError('create directory', full, err);
    }
  }
  await store.writeText(path.join(workspaceDir, CONFIG_FILE), CONFIG_TEMPLATE);
  return workspaceDir;
}

/**
 * Get author with fallback chain.
 * Priority:
 *   1. SPECLANE_AUTHOR env var
 *   2. `author` in config.yaml
 *   3. git user.name
 *   4. USER/USERNAME env var
 *   5. "unknown"
 */
export function getAuthor(config?: ProjectConfig): string {
  if (process.env.SPECLANE_AUTHOR) {
    return process.env.SPECLANE_AUTHOR;
  }

  if (config?.author) {
    return config.author;
  }

  try {
    const gitUser = execSync('git config user.name', {
      encoding: 'utf-8',
      stdio: ['pipe', 'pipe', 'ignore'],
    }).trim();
    if (gitUser) {
      return gitUser;
    }
  } catch {
    // git not available or not configured
  }

  return process.env.USER || process.env.USERNAME || 'unknown';
}
