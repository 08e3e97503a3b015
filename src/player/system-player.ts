import { execa } from 'execa';
import { errorMessage } from '../errors/custom-errors';
import { NotificationLevel, type Notifier } from '../notifications/notifier';
import type { Player } from './player';

export type PlayerSettings = {
  command?: string;
  args: string[];
};

export type RunCommand = (file: string, args: string[]) => Promise<unknown>;

const runOpener: RunCommand = (file, args) => execa(file, args, { stdio: 'ignore' });

/**
 * Command that opens a file with the desktop's default application
 */
export function defaultPlayerCommand(platform: NodeJS.Platform = process.platform): string {
  switch (platform) {
    case 'darwin':
      return 'open';
    case 'win32':
      return 'explorer';
    default:
      return 'xdg-open';
  }
}

/**
 * Opens the video with the configured command, or the platform's default handler
 */
export class SystemPlayer implements Player {
  private notifier: Notifier;
  private command: string;
  private args: string[];
  private run: RunCommand;

  constructor(notifier: Notifier, settings: PlayerSettings, run: RunCommand = runOpener) {
    this.notifier = notifier;
    this.command = settings.command ?? defaultPlayerCommand();
    this.args = settings.args;
    this.run = run;
  }

  async play(path: string): Promise<boolean> {
    this.notifier.notify(NotificationLevel.INFO, `Opening ${path} with ${this.command}`);

    try {
      await this.run(this.command, [...this.args, path]);
      return true;
    } catch (error) {
      this.notifier.notify(
        NotificationLevel.WARNING,
        `Could not start player "${this.command}": ${errorMessage(error)}`,
      );
      return false;
    }
  }
}
