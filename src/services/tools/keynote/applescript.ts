// macOS scripting bridge
// Runs AppleScript through osascript and launches applications through open(1)

import { execFile } from 'child_process';
import { promisify } from 'util';
import { errorMessage } from '../../../utils/errors.js';
import { componentLogger } from '../../../utils/logger.js';

const execFileAsync = promisify(execFile);
const log = componentLogger('applescript');

export const SCRIPT_TIMEOUT_MS = 15000;
export const SCRIPT_MAX_BUFFER = 1024 * 1024;

export interface ScriptOutcome {
  ok: boolean;
  output: string;
}

export interface ScriptBridge {
  runAppleScript(script: string): Promise<ScriptOutcome>;
  openApplication(name: string): Promise<ScriptOutcome>;
}

/** AppleScript string literal with backslashes and quotes escaped. */
export function appleScriptString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function stderrOf(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'stderr' in error) {
    const stderr = String(error.stderr).trim();
    if (stderr) return stderr;
  }
  return errorMessage(error);
}

// An output overflow also kills the child; only the timeout counts here
function timedOut(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  if ('code' in error && error.code === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') return false;
  return 'killed' in error && error.killed === true;
}

export class OsaScriptBridge implements ScriptBridge {
  constructor(
    private timeoutMs: number = SCRIPT_TIMEOUT_MS,
    private maxBuffer: number = SCRIPT_MAX_BUFFER,
  ) {}

  async runAppleScript(script: string): Promise<ScriptOutcome> {
    const tail = script.trim().slice(-50);
    try {
      const { stdout } = await execFileAsync('osascript', ['-e', script], {
        timeout: this.timeoutMs,
        maxBuffer: this.maxBuffer,
      });
      log.debug({ tail, output: stdout.trim() }, 'AppleScript succeeded');
      return { ok: true, output: stdout.trim() };
    } catch (error) {
      if (timedOut(error)) {
        log.error({ tail }, 'AppleScript timed out');
        return { ok: false, output: 'Error: AppleScript command timed out.' };
      }
      const stderr = stderrOf(error);
      log.error({ tail, stderr }, 'AppleScript failed');
      return { ok: false, output: `Error executing AppleScript: ${stderr}` };
    }
  }

  async openApplication(name: string): Promise<ScriptOutcome> {
    try {
      await execFileAsync('open', ['-a', name], { timeout: this.timeoutMs });
      return { ok: true, output: `${name} opened` };
    } catch (error) {
      const stderr = stderrOf(error);
      log.error({ application: name, stderr }, 'Failed to open application');
      return { ok: false, output: `Error opening ${name}: ${stderr}` };
    }
  }
}
