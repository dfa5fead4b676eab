/**
 * Image Path Resolution
 *
 * The image export stores a Windows directory on the mapped photo drive
 * (e.g. `B:\Acer`) and a file name. Each deployment picks one resolver at
 * startup that turns those two columns into a readable local path.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

export interface ImagePathResolver {
  readonly name: string;
  resolve(directory: string, fileName: string): string;
}

export type ImagePathStrategy = 'auto' | 'direct' | 'mapped-drive';

export const DEFAULT_DRIVE_PREFIX = 'B:\\';

export const DEFAULT_MOUNT_SEGMENTS: readonly string[] = [
  'Library',
  'CloudStorage',
  'Box-Box',
  'RBG-Shared',
  'Photo Library - Plant Records',
  'AA BRAHMS Resized Photos',
];

/**
 * Remove byte-order marks the export leaves in file names
 */
export function cleanFileName(fileName: string): string {
  return fileName.replace(/\uFEFF/g, '');
}

/**
 * Join the columns as-is (host with the mapped drive)
 */
export class DirectPathResolver implements ImagePathResolver {
  readonly name = 'direct';

  resolve(directory: string, fileName: string): string {
    return join(directory, cleanFileName(fileName));
  }
}

export interface MappedDriveOptions {
  readonly drivePrefix: string;
  readonly mountPoint: string;
}

/**
 * Swap the mapped drive prefix for a local mount of the same share
 */
export class MappedDrivePathResolver implements ImagePathResolver {
  readonly name = 'mapped-drive';
  private readonly drivePrefix: string;
  private readonly mountPoint: string;

  constructor(options: MappedDriveOptions) {
    this.drivePrefix = options.drivePrefix;
    this.mountPoint = options.mountPoint;
  }

  resolve(directory: string, fileName: string): string {
    const cleaned = cleanFileName(fileName);

    if (!directory.toLowerCase().startsWith(this.drivePrefix.toLowerCase())) {
      return join(directory, cleaned);
    }

    const segments = directory
      .slice(this.drivePrefix.length)
      .split(/[\\/]+/)
      .filter((segment) => segment.length > 0);

    return join(this.mountPoint, ...segments, cleaned);
  }
}

export interface ImagePathResolverOptions {
  readonly strategy: ImagePathStrategy;
  readonly platform?: NodeJS.Platform;
  readonly homeDir?: string;
  readonly drivePrefix?: string;
  /** Defaults to the cloud storage mount under the home directory */
  readonly mountPoint?: string;
}

/**
 * Select the resolver for this host
 *
 * `auto` uses the cloud storage mount on macOS workstations and the
 * mapped drive directly everywhere else.
 */
export function createImagePathResolver(options: ImagePathResolverOptions): ImagePathResolver {
  const platform = options.platform ?? process.platform;
  const strategy =
    options.strategy === 'auto' ? (platform === 'darwin' ? 'mapped-drive' : 'direct') : options.strategy;

  if (strategy === 'direct') {
    return new DirectPathResolver();
  }

  return new MappedDrivePathResolver({
    drivePrefix: options.drivePrefix ?? DEFAULT_DRIVE_PREFIX,
    mountPoint: options.mountPoint ?? join(options.homeDir ?? homedir(), ...DEFAULT_MOUNT_SEGMENTS),
  });
}
