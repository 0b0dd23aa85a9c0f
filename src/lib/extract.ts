import path from 'node:path';
import { execa } from 'execa';

import type { AppConfig } from './config.js';

/** External tools that turn a staged download into files under the data tree. */
export interface Archiver {
  compress(src: string, destFile: string): Promise<void>;
  untar(archive: string, destDir: string): Promise<void>;
  unzip(archive: string, destDir: string): Promise<void>;
}

export type PostProcessAction = 'compress' | 'untar' | 'unzip';

export function postProcessAction(stagingPath: string): PostProcessAction | null {
  if (stagingPath.endsWith('.nc')) return 'compress';
  if (stagingPath.endsWith('.tgz')) return 'untar';
  if (stagingPath.endsWith('.zip')) return 'unzip';
  return null;
}

/** Runs the action for a staged file; returns false when there was nothing to do. */
export async function postProcess(archiver: Archiver, stagingPath: string, destinationDir: string): Promise<boolean> {
  switch (postProcessAction(stagingPath)) {
    case 'compress':
      await archiver.compress(stagingPath, path.join(destinationDir, path.basename(stagingPath)));
      return true;
    case 'untar':
      await archiver.untar(stagingPath, destinationDir);
      return true;
    case 'unzip':
      await archiver.unzip(stagingPath, destinationDir);
      return true;
    case null:
      return false;
  }
}

export class ShellArchiver implements Archiver {
  constructor(private readonly commands: AppConfig['commands']) {}

  async compress(src: string, destFile: string): Promise<void> {
    await this.run(this.commands.compress, [src, destFile]);
  }

  async untar(archive: string, destDir: string): Promise<void> {
    await this.run(this.commands.untar, [archive, '-C', destDir]);
  }

  async unzip(archive: string, destDir: string): Promise<void> {
    await this.run(this.commands.unzip, [archive, '-d', destDir]);
  }

  // execa rejects on a non-zero exit with stderr in the message.
  private async run(argv: string[], args: string[]) {
    const [cmd, ...fixed] = argv;
    if (cmd === undefined) throw new Error('Empty command in config');
    await execa(cmd, [...fixed, ...args], { encoding: 'utf8' });
  }
}
