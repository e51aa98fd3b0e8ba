import { z } from 'zod';
import { createLogger, serializeError } from '../core/log';

/**
 * Successful command outcome. `text` is the report printed to stdout.
 */
export interface CLIResult {
  ok: true;
  text: string;
  [key: string]: unknown;
}

/**
 * A condition the user should hear about (missing toolchain root and the
 * like). Printed as text; it does not fail the process.
 */
export interface CLIError {
  ok: false;
  reason: string;
  message: string;
  hint?: string;
  [key: string]: unknown;
}

export type CLIHandler<TInput> = (input: TInput) => Promise<CLIResult | CLIError>;

export interface HandlerRegistration {
  run(rawInput: unknown): Promise<CLIResult | CLIError>;
}

/**
 * Pair a schema with the handler that consumes its parsed output.
 */
export function register<TInput>(
  schema: z.ZodType<TInput, z.ZodTypeDef, unknown>,
  handler: CLIHandler<TInput>
): HandlerRegistration {
  return {
    run: (rawInput) => handler(schema.parse(rawInput)),
  };
}

/** Where command text goes; process streams outside of tests. */
export interface CLIOutput {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const processOutput: CLIOutput = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

export interface RunOptions {
  output?: CLIOutput;
  handlers?: Record<string, HandlerRegistration>;
}

/**
 * Run a registered handler with validation and error handling and return
 * the process exit code. Handler conditions (`CLIError`) are reported on
 * stdout with code 0; invalid input and unexpected failures go to stderr
 * with code 1.
 *
 * @param commandKey - Registry key ('doc', 'root')
 * @param rawInput - Raw input assembled from Commander.js arguments and options
 */
export async function runHandler(commandKey: string, rawInput: unknown, options: RunOptions = {}): Promise<number> {
  const out = options.output ?? processOutput;
  const handlers = options.handlers ?? (await import('./registry')).cliHandlers;
  const registration = handlers[commandKey];
  if (!registration) {
    out.stderr(`odindoc: unknown command '${commandKey}'\n${ErrorHints.USAGE}\n`);
    return 1;
  }

  const log = createLogger({ component: 'cli', cmd: commandKey });
  const startedAt = Date.now();

  try {
    const result = await registration.run(rawInput);
    if (result.ok) {
      out.stdout(result.text + '\n');
    } else {
      const lines = [result.message];
      if (result.hint) lines.push(result.hint);
      out.stdout(lines.join('\n') + '\n');
    }
    log.debug(commandKey, { ok: result.ok, duration_ms: Date.now() - startedAt });
    return 0;
  } catch (e) {
    if (e instanceof z.ZodError) {
      const issues = e.issues.map((issue) => `  ${issue.path.join('.') || 'input'}: ${issue.message}`);
      out.stderr(['odindoc: invalid arguments', ...issues, ErrorHints.USAGE].join('\n') + '\n');
      return 1;
    }

    log.error(commandKey, { ok: false, duration_ms: Date.now() - startedAt, err: serializeError(e) });
    out.stderr(`odindoc: internal error: ${e instanceof Error ? e.message : String(e)}\n`);
    return 1;
  }
}

export async function executeHandler(commandKey: string, rawInput: unknown): Promise<void> {
  const code = await runHandler(commandKey, rawInput);
  if (code !== 0) process.exitCode = code;
}

export function success(text: string, data: Record<string, unknown> = {}): CLIResult {
  return {
    ok: true,
    text,
    ...data,
  };
}

export function error(reason: string, message: string, details: Record<string, unknown> = {}): CLIError {
  return {
    ok: false,
    reason,
    message,
    ...details,
  };
}

export const ErrorReasons = {
  ROOT_NOT_FOUND: 'root_not_found',
} as const;

export const ErrorHints = {
  ROOT_NOT_FOUND: "Set ODIN_ROOT to the directory that contains 'core'.",
  USAGE: 'Run "odindoc --help" for usage.',
} as const;
