// CLI Utility functions for consistent user experience
import chalk from "chalk";
import ora, { type Ora } from "ora";
import { InvalidArgumentError } from "commander";
import { StoreError, error as logError, getErrorMessage } from "@cdn-ledger/core";

/**
 * Exit codes for consistent error handling
 */
export const ExitCodes = {
  GENERAL_ERROR: 1,
  INVALID_ARGUMENT: 2,
  NOT_FOUND: 3,
  CONFLICT: 4,
  STORAGE_ERROR: 5,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Pick the exit code for an error raised by a command
 */
export function exitCodeFor(err: unknown): ExitCode {
  if (!(err instanceof StoreError)) {
    return ExitCodes.GENERAL_ERROR;
  }
  switch (err.code) {
    case "VALIDATION_FAILED":
      return ExitCodes.INVALID_ARGUMENT;
    case "NOT_FOUND":
      return ExitCodes.NOT_FOUND;
    case "UNIQUE_VIOLATION":
    case "INVALID_TRANSITION":
      return ExitCodes.CONFLICT;
    case "STORAGE_UNAVAILABLE":
      return ExitCodes.STORAGE_ERROR;
  }
}

/**
 * Consistent error formatting and logging
 */
export function handleCommandError(err: unknown, context: string): never {
  const errorMessage = getErrorMessage(err);

  // Log to system
  logError(`${context}: ${errorMessage}`);

  // Display to user
  console.error(chalk.red(`❌ ${errorMessage}`));

  process.exit(exitCodeFor(err));
}

/**
 * Commander argument parser for whole numbers
 */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not an integer.`);
  }
  return parsed;
}

/**
 * Create a spinner with consistent styling
 */
export function createSpinner(text: string): Ora {
  return ora({
    text,
    color: "blue",
    spinner: "dots",
  });
}

/**
 * Display success message with consistent formatting
 */
export function showSuccess(message: string): void {
  console.log(chalk.green(`✅ ${message}`));
}

/**
 * Display warning message with consistent formatting
 */
export function showWarning(message: string): void {
  console.log(chalk.yellow(`⚠️  ${message}`));
}
