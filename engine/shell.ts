import { spawn } from 'child_process';
import { describeError, logDebug } from '../src/debugLog';

export type OpenCommand = {
  command: string;
  args: string[];
};

export function getOpenCommand(filePath: string, platform: NodeJS.Platform = process.platform): OpenCommand {
  if (platform === 'darwin') {
    return { command: 'open', args: [filePath] };
  }
  if (platform === 'win32') {
    // `start` takes the first quoted argument as the window title.
    return { command: 'cmd', args: ['/c', 'start', '', filePath] };
  }
  return { command: 'xdg-open', args: [filePath] };
}

/**
 * Opens a file with the OS default application. Resolves to an error
 * message, or an empty string once the opener has started.
 */
export function openPath(filePath: string): Promise<string> {
  const { command, args } = getOpenCommand(filePath);

  return new Promise((resolve) => {
    const child = spawn(command, args, { detached: true, stdio: 'ignore' });
    child.once('error', (error) => {
      logDebug('shell', 'open-path-failed', { filePath, command, error: describeError(error) });
      resolve(describeError(error));
    });
    child.once('spawn', () => {
      child.unref();
      resolve('');
    });
  });
}
