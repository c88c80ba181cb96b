import type { ExitCodeCategory, ExitCodeClassification } from '../domain/index.js';

interface ExitCodeEntry {
  readonly description: string;
  readonly category: ExitCodeCategory;
  readonly recommendation?: string;
}

/** Container exit codes as reported by the kubelet. */
const EXIT_CODES: ReadonlyMap<number, ExitCodeEntry> = new Map<number, ExitCodeEntry>([
  [0, { description: 'Success', category: 'success' }],
  [1, {
    description: 'General error',
    category: 'application_error',
    recommendation: 'Review the application logs for the error that caused the exit',
  }],
  [2, {
    description: 'Misuse of shell command',
    category: 'command_error',
    recommendation: 'Check the container command and arguments for syntax errors',
  }],
  [126, {
    description: 'Command cannot execute',
    category: 'command_error',
    recommendation: 'Check file permissions and the executable bit of the entrypoint',
  }],
  [127, {
    description: 'Command not found',
    category: 'command_error',
    recommendation: 'Ensure the binary exists in the image and check ENTRYPOINT/CMD',
  }],
  [128, {
    description: 'Invalid exit argument',
    category: 'command_error',
    recommendation: 'Check that the process exits with an integer status between 0 and 255',
  }],
  [130, {
    description: 'Interrupted (SIGINT)',
    category: 'terminated',
    recommendation: 'Find what sent SIGINT to the container process',
  }],
  [137, {
    description: 'Killed (SIGKILL), likely OOM',
    category: 'oom_killed',
    recommendation: 'Increase memory limit or investigate leak',
  }],
  [143, {
    description: 'Terminated (SIGTERM)',
    category: 'terminated',
    recommendation: 'Expected during rolling updates; otherwise verify the app handles SIGTERM gracefully',
  }],
]);

/**
 * Classifies a container exit code.
 *
 * Total over all numbers: anything outside the table is `unknown`.
 */
export function classifyExitCode(code: number): ExitCodeClassification {
  const entry = EXIT_CODES.get(code);
  if (entry === undefined) {
    return { code, description: 'Unknown error', category: 'unknown' };
  }
  return { code, ...entry };
}
