import type { ComposeFrontEnd } from '@valhalla/shared';

import type { Logger } from '../core/logger.js';
import { shellEscape, type CommandRunner } from '../core/run-command.js';
import { composeCommandLine } from '../runtime/runtime-detector.js';

export const APP_CONTAINER = 'valhalla-app';

export class ComposeLauncher {
  constructor(
    private readonly frontEnd: ComposeFrontEnd,
    private readonly composeFile: string,
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
  ) {}

  private base(): string {
    return `${composeCommandLine(this.frontEnd)} -f ${shellEscape(this.composeFile)}`;
  }

  async pullAndStart(): Promise<void> {
    const onLog = (line: string) => this.logger.info(line);

    this.logger.info({ command: `${this.base()} pull` }, 'Pulling images');
    await this.runner.stream(`${this.base()} pull`, onLog);

    this.logger.info({ command: `${this.base()} up -d --no-build` }, 'Starting services');
    await this.runner.stream(`${this.base()} up -d --no-build`, onLog);
  }

  logsHint(): string {
    return `${this.base()} logs -f`;
  }

  /** Podman only: the app container must resolve the database by name. */
  async verifyDatabaseDns(container = APP_CONTAINER, host = 'mysql'): Promise<boolean> {
    return this.runner.succeeds(
      `podman exec ${shellEscape(container)} getent hosts ${shellEscape(host)}`,
    );
  }
}
