import { spawn, type ChildProcess } from 'child_process';

export interface ProcessResult {
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface RunProcessOptions {
  timeoutMs: number;
  cwd?: string;
}

const USE_PROCESS_GROUP = process.platform !== 'win32';

/**
 * SIGKILL the child's whole process group, so helpers it forked die with it.
 * Falls back to the child alone where there is no group.
 */
function killProcessTree(child: ChildProcess): void {
  if (USE_PROCESS_GROUP && child.pid !== undefined) {
    try {
      process.kill(-child.pid, 'SIGKILL');
      return;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ESRCH') return;
    }
  }
  child.kill('SIGKILL');
}

/**
 * Run a command to completion. On timeout the child and its descendants are killed
 * and the promise resolves at once with timedOut set; spawn failures reject.
 */
export function runProcess(command: string, args: string[], options: RunProcessOptions): Promise<ProcessResult> {
  return new Promise<ProcessResult>((resolve, reject) => {
    const child = spawn(command, args, { cwd: options.cwd, windowsHide: true, detached: USE_PROCESS_GROUP });

    let stdout = '';
    let stderr = '';
    let settled = false;

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      killProcessTree(child);
      child.stdout.destroy();
      child.stderr.destroy();
      resolve({ code: null, stdout, stderr, timedOut: true });
    }, options.timeoutMs);

    child.stdout.on('data', (d: Buffer) => (stdout += d.toString()));
    child.stderr.on('data', (d: Buffer) => (stderr += d.toString()));

    child.on('error', (error) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(error);
    });
    child.on('close', (code) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({ code, stdout, stderr, timedOut: false });
    });
  });
}
