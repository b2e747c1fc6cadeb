import inquirer from 'inquirer';

/**
 * Terminal interaction used by setup. `say` writes to stdout; logs go to
 * stderr through pino. `input` shows the message as given: callers put any
 * current value in the text and handle blank answers themselves.
 */
export interface Prompter {
  input(message: string): Promise<string>;
  confirm(message: string, defaultValue?: boolean): Promise<boolean>;
  say(message: string): void;
}

export class InquirerPrompter implements Prompter {
  async input(message: string): Promise<string> {
    const { answer } = await inquirer.prompt<{ answer: string }>([
      {
        type: 'input',
        name: 'answer',
        message,
      },
    ]);
    return answer;
  }

  async confirm(message: string, defaultValue = false): Promise<boolean> {
    const { answer } = await inquirer.prompt<{ answer: boolean }>([
      {
        type: 'confirm',
        name: 'answer',
        message,
        default: defaultValue,
      },
    ]);
    return answer;
  }

  say(message: string): void {
    process.stdout.write(`${message}\n`);
  }
}
