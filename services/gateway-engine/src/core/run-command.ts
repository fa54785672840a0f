import { exec } from 'child_process';

const MAX_BUFFER_BYTES = 1024 * 1024 * 8;

export type LogCallback = (line: string) => void;

export const runCommand = async (command: string): Promise<string> => {
  return new Promise((resolve, reject) => {
    exec(command, { maxBuffer: MAX_BUFFER_BYTES }, (error, stdout, stderr) => {
      if (error) {
        reject(new Error(stderr.trim() || error.message));
        return;
      }
      resolve(stdout.trim());
    });
  });
};

/**
 * Run a command and hand every non-empty stdout/stderr line to `onLog` as it
 * arrives. Resolves with the full stdout once the process exits with code 0.
 */
export const runCommandStreaming = async (
  command: string,
  onLog?: LogCallback,
): Promise<string> => {
  return new Promise((resolve, reject) => {
    const child = exec(command, { maxBuffer: MAX_BUFFER_BYTES });

    let stdoutText = '';
    let stderrText = '';
    const remainders = { stdout: '', stderr: '' };

    const emitLines = (stream: 'stdout' | 'stderr', chunk: Buffer | string) => {
      const text = remainders[stream] + (typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
      const lines = text.split(/\r?\n/);
      remainders[stream] = lines.pop() ?? '';
      for (const line of lines) {
        const trimmed = line.trim();
        if (trimmed) {
          onLog?.(trimmed);
        }
      }
    };

    child.stdout?.on('data', (chunk: Buffer | string) => {
      stdoutText += typeof chunk === 'string' ? chunk : chunk.toString('utf8');
      emitLines('stdout', chunk);
    });

    child.stderr?.on('data', (chunk: Buffer | string) => {
      stderrText += typeof chunk === 'string' ? chunk : chunk.toString('utf8');
      emitLines('stderr', chunk);
    });

    child.on('close', (code) => {
      for (const rest of [remainders.stdout, remainders.stderr]) {
        if (rest.trim()) onLog?.(rest.trim());
      }

      if (code !== 0) {
        reject(new Error(stderrText.trim() || `Command exited with code ${code}`));
        return;
      }
      resolve(stdoutText.trim());
    });

    child.on('error', (error) => {
      reject(error);
    });
  });
};
