/**
 * Next-step hints shown after lifecycle commands
 */

import chalk from "chalk";

export const nextSteps = {
  afterPropose: (id: string) =>
    chalk.gray(
      `Fill in proposal.md, tasks.md and the spec delta, then run: speclane validate ${id}`,
    ),
  afterValidate: (id: string) =>
    chalk.gray(`When the tasks are done, run: speclane apply ${id} --all`),
  afterApply: (id: string) => chalk.gray(`Run: speclane archive ${id}`),
  fixAndRevalidate: (id: string) =>
    chalk.gray(`Fix the problems above and run: speclane validate ${id}`),
} as const;
