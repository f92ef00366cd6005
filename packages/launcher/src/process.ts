/**
 * Gateway hand-off
 *
 * Node.js cannot replace its own process image, so the gateway runs as a child
 * with inherited stdio. Termination signals are relayed to it and its exit
 * status becomes the launcher's. There is no retry and no restart.
 */

import { spawn, type SpawnOptions } from 'child_process';
import { EventEmitter } from 'events';
import { constants } from 'os';
import {
  Errors,
  FORWARDED_SIGNALS,
  createLogger,
  formatError,
  getSystemErrorCode,
  type LauncherError,
  type Logger,
} from '@nanobot-launcher/core';
import { prepareEnvironment, type Env, type PreparedEnvironment } from './environment.js';
import { resolveLauncherSettings, type LauncherSettings } from './settings.js';

/**
 * The parts of a child process the launcher relies on
 */
export interface GatewayProcess extends EventEmitter {
  readonly pid?: number;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => GatewayProcess;

export interface LaunchOptions {
  /** Environment to derive the child's from (default: process.env) */
  env?: Env;
  /** Settings (default: resolved from env) */
  settings?: LauncherSettings;
  /** Process factory (default: child_process.spawn) */
  spawn?: SpawnFunction;
  /** Emits the signals to relay (default: process) */
  signalSource?: NodeJS.EventEmitter;
  logger?: Logger;
}

export interface LaunchResult {
  /** Child exit code, or the shell-style code of a failed spawn */
  exitCode: number | null;
  /** Signal that terminated the child */
  signal: NodeJS.Signals | null;
  /** Set when the child could not be started */
  error?: LauncherError;
  /** What the environment preparation decided */
  prepared: PreparedEnvironment;
}

const defaultSpawn: SpawnFunction = (command, args, options) => spawn(command, [...args], options);

/**
 * Map a spawn failure to the error the shell would report
 */
export function spawnError(command: string, error: unknown): LauncherError {
  const cause = error instanceof Error ? error : undefined;
  switch (getSystemErrorCode(error)) {
    case 'ENOENT':
      return Errors.commandNotFound(command, cause);
    case 'EACCES':
      return Errors.commandNotExecutable(command, cause);
    default:
      return Errors.spawnFailed(command, cause);
  }
}

/**
 * Exit code for the launcher, following shell conventions for signals (128 + n)
 */
export function exitCodeFor(result: Pick<LaunchResult, 'exitCode' | 'signal'>): number {
  if (result.exitCode !== null) {
    return result.exitCode;
  }
  if (result.signal) {
    return 128 + (constants.signals[result.signal] ?? 0);
  }
  return 1;
}

/**
 * Prepare the environment and run the gateway until it exits
 */
export function launchGateway(options: LaunchOptions = {}): Promise<LaunchResult> {
  const env = options.env ?? process.env;
  const settings = options.settings ?? resolveLauncherSettings(env);
  const logger = options.logger ?? createLogger({ level: settings.logLevel });
  const spawnProcess = options.spawn ?? defaultSpawn;
  const signalSource: NodeJS.EventEmitter = options.signalSource ?? process;

  const prepared = prepareEnvironment(env, settings);
  logger.debug('Prepared gateway environment', {
    reason: prepared.reason,
    configVar: settings.configVar,
  });

  logger.info(`Starting ${[settings.command, ...settings.args].join(' ')}`);

  return new Promise<LaunchResult>((resolve) => {
    let settled = false;
    const relays = new Map<NodeJS.Signals, () => void>();

    const finish = (result: Omit<LaunchResult, 'prepared'>): void => {
      if (settled) return;
      settled = true;
      for (const [signal, relay] of relays) {
        signalSource.off(signal, relay);
      }
      resolve({ ...result, prepared });
    };

    const fail = (error: unknown): void => {
      const launchError = spawnError(settings.command, error);
      logger.error(formatError(launchError));
      finish({ exitCode: launchError.exitCode, signal: null, error: launchError });
    };

    let child: GatewayProcess;
    try {
      child = spawnProcess(settings.command, settings.args, {
        env: prepared.env,
        stdio: 'inherit',
      });
    } catch (error) {
      fail(error);
      return;
    }

    child.once('error', fail);
    child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      logger.debug('Gateway exited', { code, signal });
      finish({ exitCode: code, signal });
    });

    for (const signal of FORWARDED_SIGNALS) {
      const relay = (): void => {
        logger.debug(`Relaying ${signal} to gateway`, { pid: child.pid });
        child.kill(signal);
      };
      relays.set(signal, relay);
      signalSource.on(signal, relay);
    }
  });
}
