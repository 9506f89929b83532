/**
 * Workspace context for CLI commands
 */

import { ProposalLifecycle } from '../lifecycle/index.js';
import { initContext, type SpeclaneContext } from '../store/index.js';
import { debug } from './output.js';

/**
 * Directory the workspace search starts from (set by --root)
 */
let rootDir: string | undefined;

export function setRootDir(dir: string | undefined): void {
  rootDir = dir;
}

export function getRootDir(): string {
  return rootDir ?? process.cwd();
}

export async function loadContext(): Promise<SpeclaneContext> {
  const ctx = await initContext({ cwd: getRootDir() });
  debug(`workspace: ${ctx.workspaceDir}`);
  debug(`config: ${ctx.configPath ?? '(defaults)'}`);
  return ctx;
}

export function createLifecycle(ctx: SpeclaneContext): ProposalLifecycle {
  return new ProposalLifecycle(ctx.store, {
    verbs: ctx.config.verbs,
    strict: ctx.config.strict,
  });
}
