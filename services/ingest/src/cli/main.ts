import { CommanderError } from "commander";
import { isUsageError } from "../errors.js";
import { createLogger } from "../logger.js";
import { initTracing, shutdownTracing } from "../tracing.js";
import { parseCliArgs } from "./options.js";
import { runCommand, type RunContext } from "./run.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

function exitCodeFor(error: unknown): number {
  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
  }
  return isUsageError(error) ? EXIT_USAGE : EXIT_FAILURE;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run one CLI invocation and return its exit code.
 * Failures are reported as a single line on stderr; nothing is thrown.
 */
export async function main(
  argv: string[],
  context: RunContext & { stderr?: (text: string) => void } = {},
): Promise<number> {
  const stderr = context.stderr ?? ((text: string) => process.stderr.write(`${text}\n`));
  const env = context.env ?? process.env;

  try {
    const options = parseCliArgs(argv);
    await initTracing(env);
    await runCommand(options, { ...context, env });
    return EXIT_OK;
  } catch (error) {
    const code = exitCodeFor(error);
    if (code !== EXIT_OK) {
      stderr(errorMessage(error));
    }
    return code;
  } finally {
    try {
      await shutdownTracing();
    } catch (error) {
      // Spans are lost, the command's outcome stands.
      (context.logger ?? createLogger()).warn("Failed to flush traces", { error: errorMessage(error) });
    }
  }
}
