/**
 * Audio File Service
 * Write-once storage for generated audio. Existing files are never
 * overwritten: a taken name moves on to name_v2.ext, name_v3.ext, ...
 */

import fs from 'fs/promises';
import path from 'path';
import { env } from '@/shared/config';
import { generateId, logger } from '@/shared/utils';
import { ParameterError } from '@/modules/sfx';
import { STORAGE_CONSTANTS } from '../config/storage.constants';

export interface SaveAudioOptions {
  outputDirectory?: string;
  outputFilename?: string;
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Split a file name into base and extension, defaulting the extension
 */
export function splitFilename(filename: string): { base: string; ext: string } {
  const ext = path.extname(filename);
  if (!ext) {
    return { base: filename, ext: STORAGE_CONSTANTS.DEFAULT_EXTENSION };
  }
  return { base: filename.slice(0, -ext.length), ext };
}

export function versionedFilename(base: string, ext: string, version: number): string {
  return `${base}_v${version}${ext}`;
}

export class AudioFileService {
  constructor(private readonly defaultDirectory: string = env.SFX_TEMP_DIR) {}

  resolveDirectory(outputDirectory?: string): string {
    return outputDirectory ? path.resolve(outputDirectory) : this.defaultDirectory;
  }

  /**
   * Reject options that save() would refuse, without touching the disk
   */
  validateOptions(options: SaveAudioOptions): void {
    if (options.outputFilename) {
      this.assertPlainFilename(options.outputFilename);
    }
  }

  /**
   * Save audio and return the absolute path of the written file
   */
  async save(audio: Uint8Array, options: SaveAudioOptions = {}): Promise<string> {
    const directory = this.resolveDirectory(options.outputDirectory);
    await fs.mkdir(directory, { recursive: true });

    const filePath = options.outputFilename
      ? await this.writeVersioned(directory, options.outputFilename, audio)
      : await this.writeGenerated(directory, audio);

    logger.info('Audio file written', { path: filePath, bytes: audio.length });
    return filePath;
  }

  private async writeGenerated(directory: string, audio: Uint8Array): Promise<string> {
    const filename = `${STORAGE_CONSTANTS.GENERATED_NAME_PREFIX}${generateId()}${STORAGE_CONSTANTS.DEFAULT_EXTENSION}`;
    const filePath = path.join(directory, filename);
    await fs.writeFile(filePath, audio, { flag: 'wx' });
    return filePath;
  }

  private async writeVersioned(directory: string, filename: string, audio: Uint8Array): Promise<string> {
    this.assertPlainFilename(filename);
    const { base, ext } = splitFilename(filename);

    let candidate = path.join(directory, `${base}${ext}`);
    for (let version: number = STORAGE_CONSTANTS.FIRST_VERSION; ; version++) {
      try {
        // 'wx' fails with EEXIST on a taken name
        await fs.writeFile(candidate, audio, { flag: 'wx' });
        return candidate;
      } catch (error) {
        if (!isAlreadyExists(error)) {
          throw error;
        }
      }
      candidate = path.join(directory, versionedFilename(base, ext, version));
    }
  }

  private assertPlainFilename(filename: string): void {
    if (filename === '.' || filename === '..' || filename !== path.basename(filename) || filename.includes('\\')) {
      throw new ParameterError(`Output filename must be a plain file name, got "${filename}".`);
    }
  }
}

export const audioFileService = new AudioFileService();
