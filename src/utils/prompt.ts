import { confirm, input, select } from "@inquirer/prompts";
import chalk from "chalk";
import { ExitCode } from "../errors.js";
import { logger } from "./logger.js";

type CleanupFn = () => Promise<void> | void;

type PromptChoice<T> = {
  name: string;
  value: T;
  description?: string;
};

type BasePromptOptions = {
  message: string;
  cleanup?: CleanupFn;
};

function isExitPromptError(error: unknown): boolean {
  return error instanceof Error && error.name === "ExitPromptError";
}

async function handlePromptExit(cleanup?: CleanupFn): Promise<never> {
  logger.info(chalk.yellow("\n\n⚠ Prompt cancelled by user (Ctrl+C)"));
  logger.info(chalk.gray("Cleaning up resources..."));
  if (cleanup) {
    await cleanup();
  }
  logger.info(chalk.gray("Exiting..."));
  process.exit(ExitCode.Interrupted);
}

/**
 * Run a prompt; Ctrl+C runs the cleanup and exits with 130
 */
async function withPromptExit<T>(ask: () => Promise<T>, cleanup?: CleanupFn): Promise<T> {
  try {
    return await ask();
  } catch (error) {
    if (isExitPromptError(error)) {
      return handlePromptExit(cleanup);
    }
    throw error;
  }
}

export function promptInput(
  options: BasePromptOptions & {
    default?: string;
    validate?: (value: string) => boolean | string;
  },
): Promise<string> {
  return withPromptExit(
    () =>
      input({
        message: options.message,
        default: options.default,
        validate: options.validate,
      }),
    options.cleanup,
  );
}

export function promptConfirm(
  options: BasePromptOptions & { default?: boolean },
): Promise<boolean> {
  return withPromptExit(
    () => confirm({ message: options.message, default: options.default }),
    options.cleanup,
  );
}

export function promptSelect<T>(
  options: BasePromptOptions & { choices: PromptChoice<T>[]; default?: T },
): Promise<T> {
  return withPromptExit(
    () =>
      select<T>({
        message: options.message,
        choices: options.choices,
        default: options.default,
      }),
    options.cleanup,
  );
}
