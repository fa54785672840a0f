import { runCommand, runCommandStreaming, type LogCallback } from './run-command.js';

let isInContainerCached: boolean | null = null;

export const shellEscape = (value: string): string =>
  `'${value.replace(/'/g, `'\"'\"'`)}'`;

async function checkIsInContainer(): Promise<boolean> {
  if (isInContainerCached !== null) return isInContainerCached;

  try {
    await runCommand('test -f /.dockerenv');
    isInContainerCached = true;
  } catch {
    isInContainerCached = false;
  }
  return isInContainerCached;
}

const wrapForHost = async (command: string): Promise<string> =>
  (await checkIsInContainer())
    ? `nsenter -t 1 -m -u -n -i sh -c ${shellEscape(command)}`
    : command;

/**
 * Run a command on the host system. Inside a container this enters the
 * host's namespaces through PID 1, which needs --privileged and --pid=host.
 */
export async function runHostCommand(command: string): Promise<string> {
  return runCommand(await wrapForHost(command));
}

export async function runHostCommandStreaming(command: string, onLog?: LogCallback): Promise<string> {
  return runCommandStreaming(await wrapForHost(command), onLog);
}
