import { spawn } from 'node:child_process';

export interface GitResult {
  stdout: string;
  stderr: string;
}

export class GitCommandError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stderr: string
  ) {
    super(message);
    this.name = 'GitCommandError';
  }
}

/** Hide credentials embedded in remote URLs */
export function redact(text: string): string {
  return text.replace(/\/\/[^/@\s]+@/g, '//***@');
}

/** Run git with an argument array (no shell) and collect its output */
export function runGit(args: string[], cwd: string): Promise<GitResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn('git', args, {
      cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
    });

    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('close', (code) => {
      if (code !== 0) {
        const command = redact(`git ${args.join(' ')}`);
        reject(new GitCommandError(`${command} exited with code ${code}: ${redact(stderr.trim())}`, code, redact(stderr)));
      } else {
        resolve({ stdout, stderr });
      }
    });

    proc.on('error', (err) => {
      reject(new GitCommandError(`Failed to run git: ${err.message}`, null, ''));
    });
  });
}
