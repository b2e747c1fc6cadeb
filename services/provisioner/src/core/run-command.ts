import { exec } from 'child_process';

import { CommandFailedError } from './errors.js';

export type LogCallback = (line: string) => void;

export const shellEscape = (value: string): string =>
  `'${value.replace(/'/g, `'\"'\"'`)}'`;

export const shellJoin = (argv: string[]): string => argv.map(shellEscape).join(' ');

export const runCommand = async (command: string): Promise<string> => {
  return new Promise((resolve, reject) => {
    exec(command, { maxBuffer: 1024 * 1024 * 10 }, (error, stdout, stderr) => {
      if (error) {
        reject(new CommandFailedError(command, stderr.trim() || error.message));
        return;
      }
      resolve(stdout.trim());
    });
  });
};

/**
 * Run a command and stream stdout/stderr lines to a callback as they arrive.
 */
export const runCommandStreaming = async (
  command: string,
  onLog?: LogCallback,
): Promise<string> => {
  return new Promise((resolve, reject) => {
    const child = exec(command, { maxBuffer: 1024 * 1024 * 10 });

    const stdoutChunks: string[] = [];
    let stderrText = '';

    const emitLine = (line: string) => {
      const trimmed = line.trim();
      if (trimmed && onLog) {
        onLog(trimmed);
      }
    };

    const lineSplitter = () => {
      let remainder = '';
      return {
        push(text: string) {
          const lines = (remainder + text).split(/\r?\n/);
          remainder = lines.pop() ?? '';
          lines.forEach(emitLine);
        },
        flush() {
          if (remainder.trim()) emitLine(remainder);
          remainder = '';
        },
      };
    };

    const stdoutLines = lineSplitter();
    const stderrLines = lineSplitter();

    child.stdout?.on('data', (chunk: Buffer | string) => {
      const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
      stdoutChunks.push(text);
      stdoutLines.push(text);
    });

    child.stderr?.on('data', (chunk: Buffer | string) => {
      const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
      stderrText += text;
      stderrLines.push(text);
    });

    child.on('close', (code) => {
      stdoutLines.flush();
      stderrLines.flush();

      if (code !== 0) {
        reject(new CommandFailedError(command, stderrText.trim() || `Command exited with code ${code}`));
        return;
      }
      resolve(stdoutChunks.join('').trim());
    });

    child.on('error', (error) => {
      reject(error);
    });
  });
};

/**
 * Shell access as seen by the setup components. Tests substitute a recording fake.
 */
export interface CommandRunner {
  run(command: string): Promise<string>;
  stream(command: string, onLog?: LogCallback): Promise<string>;
  succeeds(command: string): Promise<boolean>;
  hasExecutable(name: string): Promise<boolean>;
}

export class ShellCommandRunner implements CommandRunner {
  run(command: string): Promise<string> {
    return runCommand(command);
  }

  stream(command: string, onLog?: LogCallback): Promise<string> {
    return runCommandStreaming(command, onLog);
  }

  async succeeds(command: string): Promise<boolean> {
    try {
      await runCommand(`${command} >/dev/null 2>&1`);
      return true;
    } catch {
      return false;
    }
  }

  hasExecutable(name: string): Promise<boolean> {
    return this.succeeds(`command -v ${shellEscape(name)}`);
  }
}
