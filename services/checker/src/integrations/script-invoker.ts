/**
 * Scoring Script Integration
 *
 * Runs the external Python scoring script inside a micromamba environment
 * and parses its JSON stdout.
 * Note: any failure yields null; callers only distinguish result vs. no result.
 */

import { z } from 'zod';
import { createLogger, type Logger, type MicromambaClient } from '@threatcheck/environments';

export const scriptResultSchema = z.object({
  score: z.union([z.number(), z.string()]),
  reason: z.string(),
});

export type ScriptResult = z.infer<typeof scriptResultSchema>;

export interface InvokeScriptOptions {
  scriptPath: string;
  environmentName: string;
  /** Must already be validated; passed as one `--message=<text>` argv element */
  message: string;
}

function parseCandidate(text: string): ScriptResult | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }
  const result = scriptResultSchema.safeParse(value);
  return result.success ? result.data : null;
}

/**
 * Parses script stdout into a ScriptResult. The whole output is tried first,
 * then each line from the last one up (scripts sometimes print warnings first).
 */
export function parseScriptOutput(stdout: string): ScriptResult | null {
  const trimmed = stdout.trim();
  if (!trimmed) {
    return null;
  }

  const whole = parseCandidate(trimmed);
  if (whole) {
    return whole;
  }

  const lines = trimmed
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
  for (let index = lines.length - 1; index >= 0; index -= 1) {
    const candidate = parseCandidate(lines[index]);
    if (candidate) {
      return candidate;
    }
  }

  return null;
}

export async function invokeScript(
  client: MicromambaClient,
  options: InvokeScriptOptions,
  logger: Logger = createLogger('ScriptInvoker')
): Promise<ScriptResult | null> {
  try {
    const result = await client.runIn(options.environmentName, [
      'python',
      options.scriptPath,
      `--message=${options.message}`,
    ]);

    if (!result.success) {
      logger.error(
        `Script exited with ${result.timedOut ? 'timeout' : `code ${result.exitCode}`}:`,
        result.stderr.trim()
      );
      return null;
    }

    const parsed = parseScriptOutput(result.stdout);
    if (!parsed) {
      logger.error('Script output was not a JSON object with score and reason');
      logger.debug('Raw script output:', result.stdout);
    }
    return parsed;
  } catch (error) {
    logger.error('Script invocation failed:', error instanceof Error ? error.message : String(error));
    return null;
  }
}
