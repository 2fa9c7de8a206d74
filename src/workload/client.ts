/**
 * Filesystem-backed workload
 *
 * Writes the service files into a configuration directory and drives the
 * service through an external service manager command
 * (`<command> start|stop|restart|is-active <unit>`). Without a command the run
 * state is tracked in a marker file next to the configuration.
 */

import { execFile } from 'node:child_process';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { promisify } from 'node:util';
import { TransientBackendFailure } from '../errors.js';
import { logger as defaultLogger, type OperatorLogger } from './logger.js';
import { buildServicePaths, type ServicePaths, type Workload } from './types.js';

const execFileAsync = promisify(execFile);

/** Marker file used when no service manager is configured */
const RUN_MARKER = '.service-running';

/**
 * Options for the filesystem workload
 */
export interface FileWorkloadOptions {
  /** Configuration directory */
  confDir: string;
  /** Service manager executable, e.g. `systemctl` */
  serviceCommand?: string;
  /** Unit/service name passed to the service manager */
  serviceName?: string;
  /** File mode for written files */
  fileMode?: number;
  logger?: OperatorLogger;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Workload that operates on the local filesystem
 */
export class FileWorkload implements Workload {
  readonly paths: ServicePaths;
  private readonly serviceCommand?: string;
  private readonly serviceName: string;
  private readonly fileMode: number;
  private readonly log: OperatorLogger;

  constructor(options: FileWorkloadOptions) {
    this.paths = buildServicePaths(options.confDir);
    this.serviceCommand = options.serviceCommand;
    this.serviceName = options.serviceName ?? 'karapace';
    this.fileMode = options.fileMode ?? 0o600;
    this.log = (options.logger ?? defaultLogger).child({ component: 'workload' });
  }

  async start(signal?: AbortSignal): Promise<void> {
    await this.service('start', signal);
  }

  async stop(signal?: AbortSignal): Promise<void> {
    await this.service('stop', signal);
  }

  async restart(signal?: AbortSignal): Promise<void> {
    await this.service('restart', signal);
  }

  async read(path: string): Promise<string | undefined> {
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw error;
    }
  }

  async write(path: string, content: string, signal?: AbortSignal): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, { encoding: 'utf-8', mode: this.fileMode, signal });
    this.log.debug('Wrote service file', { path });
  }

  async remove(path: string): Promise<void> {
    await rm(path, { force: true });
    this.log.debug('Removed service file', { path });
  }

  async active(signal?: AbortSignal): Promise<boolean> {
    if (!this.serviceCommand) {
      return (await this.read(join(this.paths.confDir, RUN_MARKER))) !== undefined;
    }
    try {
      await execFileAsync(this.serviceCommand, ['is-active', this.serviceName], { signal });
      return true;
    } catch {
      // is-active exits non-zero for inactive services
      return false;
    }
  }

  private async service(action: 'start' | 'stop' | 'restart', signal?: AbortSignal): Promise<void> {
    if (!this.serviceCommand) {
      const marker = join(this.paths.confDir, RUN_MARKER);
      if (action === 'stop') {
        await this.remove(marker);
      } else {
        await this.write(marker, new Date().toISOString(), signal);
      }
      return;
    }

    try {
      await execFileAsync(this.serviceCommand, [action, this.serviceName], { signal });
      this.log.info(`Service ${action} succeeded`, { service: this.serviceName });
    } catch (error) {
      const stderr =
        error instanceof Error && 'stderr' in error && typeof error.stderr === 'string' && error.stderr.trim()
          ? error.stderr.trim()
          : String(error);
      throw new TransientBackendFailure(
        `${this.serviceCommand} ${action} ${this.serviceName} failed: ${stderr}`,
        action
      );
    }
  }
}
