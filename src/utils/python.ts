import { spawn } from 'child_process';
import { existsSync } from 'fs';
import path from 'path';

function pickFirstExisting(candidates: string[]): string | null {
  for (const candidate of candidates) {
    if (existsSync(candidate)) return candidate;
  }
  return null;
}

function venvInterpreters(venvDir: string): string[] {
  return [path.join(venvDir, 'bin', 'python'), path.join(venvDir, 'Scripts', 'python.exe')];
}

/**
 * Interpreter for external scripts: PYTHON_EXECUTABLE, then the active
 * virtualenv, then a `.venv` in any of `projectDirs` (first match wins).
 */
export function resolvePythonExecutable(projectDirs: string[] = [process.cwd()]): string {
  const override = process.env.PYTHON_EXECUTABLE?.trim();
  if (override) return override;

  const fromVenvEnv = process.env.VIRTUAL_ENV?.trim();
  if (fromVenvEnv) {
    const fromActiveVenv = pickFirstExisting(venvInterpreters(fromVenvEnv));
    if (fromActiveVenv) return fromActiveVenv;
  }

  const localVenv = pickFirstExisting(
    projectDirs.flatMap((dir) => venvInterpreters(path.join(dir, '.venv')))
  );
  if (localVenv) return localVenv;

  return 'python3';
}

export interface ScriptResult {
  stdout: string;
  stderr: string;
}

export type ScriptRunner = (
  python: string,
  args: string[],
  options: { cwd: string; timeoutMs: number }
) => Promise<ScriptResult>;

/** Runs a script to completion; rejects on spawn failure, timeout or non-zero exit. */
export const runPythonScript: ScriptRunner = (python, args, { cwd, timeoutMs }) =>
  new Promise((resolve, reject) => {
    const child = spawn(python, args, {
      cwd,
      env: process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';

    const timeout = setTimeout(() => {
      child.kill();
      reject(new Error(`Python process timeout (${Math.round(timeoutMs / 1000)}s)`));
    }, timeoutMs);

    child.stdout.on('data', (data) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data) => {
      stderr += data.toString();
    });

    child.on('error', (err) => {
      clearTimeout(timeout);
      reject(new Error(`Failed to spawn Python process: ${err.message}`));
    });

    child.on('close', (code) => {
      clearTimeout(timeout);
      if (code !== 0) {
        reject(new Error(`Python process exited with code ${code}: ${stderr.trim() || stdout.trim()}`));
        return;
      }
      resolve({ stdout, stderr });
    });
  });
