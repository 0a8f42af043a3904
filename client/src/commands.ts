/**
 * Command line for the sync clients: `sync` pushes a directory to the server,
 * `pull` applies the server's copy of a modpack to a directory.
 */

import { resolve } from 'node:path';
import { Command } from 'commander';
import {
  DownloadReconciler,
  ModsyncClient,
  PROTOCOL_VERSION,
  UploadReconciler,
  getLog,
  loadDownloadConfig,
  loadUploadConfig,
  type DownloadRunResult,
  type ModsyncApi,
  type UploadRunResult,
} from '@modsync/core';

const log = getLog('cli');

export interface ServerConnection {
  serverUrl: string;
  apiKey: string;
}

export interface CommandDependencies {
  /** Build the API a command talks to */
  connect(connection: ServerConnection): ModsyncApi;
}

const defaultDependencies: CommandDependencies = {
  connect: (connection) => new ModsyncClient(connection),
};

export interface SyncCommandOptions {
  forceSync?: boolean;
  forceUpload?: boolean;
  seedFromServer?: boolean;
}

export interface PullCommandOptions {
  forceCheck?: boolean;
}

/**
 * Push the changes of `directory`, configured by its modsync.sync.json
 */
export async function runSync(
  directory: string,
  options: SyncCommandOptions,
  deps: CommandDependencies = defaultDependencies
): Promise<UploadRunResult> {
  const targetDir = resolve(directory);
  const config = await loadUploadConfig(targetDir);
  const api = deps.connect({ serverUrl: config.serverUrl, apiKey: config.apiKey });

  const result = await new UploadReconciler(api, targetDir).run({
    modpackId: config.modpackId,
    include: config.includeGlobs,
    excludes: config.excludes,
    forceSync: options.forceSync,
    forceUpload: options.forceUpload,
    seedFromServer: options.seedFromServer,
  });

  for (const error of result.scanErrors) {
    log.warn({ path: error.path, reason: error.reason }, 'Not synchronized');
  }
  log.info(
    {
      created: result.created.length,
      updated: result.updated.length,
      deleted: result.deleted.length,
      uploads: result.uploads,
      uploadVersion: result.uploadVersion,
    },
    'Sync finished'
  );
  return result;
}

/**
 * Bring `directory` in line with the server, configured by its modsync.json
 */
export async function runPull(
  directory: string,
  options: PullCommandOptions,
  deps: CommandDependencies = defaultDependencies
): Promise<DownloadRunResult> {
  const targetDir = resolve(directory);
  const config = await loadDownloadConfig(targetDir);
  const api = deps.connect({ serverUrl: config.serverUrl, apiKey: config.apiKey });

  const result = await new DownloadReconciler(api, targetDir).run({
    modpackId: config.modpackId,
    forceCheck: options.forceCheck,
  });

  for (const failure of result.skipped) {
    log.warn({ path: failure.path, reason: failure.reason }, 'Not updated');
  }
  return result;
}

export function registerSyncCommands(program: Command, deps: CommandDependencies = defaultDependencies): void {
  program
    .command('sync')
    .description('Push local changes to the server')
    .argument('[directory]', 'Directory holding modsync.sync.json', '.')
    .option('--force-sync', 'Send every tracked entry, changed or not')
    .option('--force-upload', 'Send the bytes of every pushed file')
    .option('--seed-from-server', "Rebuild the local history from the server's listing")
    .action(async (directory: string, options: SyncCommandOptions) => {
      await runSync(directory, options, deps);
    });

  program
    .command('pull')
    .description('Download the modpack into a directory')
    .argument('[directory]', 'Directory holding modsync.json', '.')
    .option('-f, --force-check', 'Rehash every present file')
    .action(async (directory: string, options: PullCommandOptions) => {
      await runPull(directory, options, deps);
    });
}

export function createProgram(deps: CommandDependencies = defaultDependencies): Command {
  const program = new Command();
  program.name('modsync').description('Synchronize a mod directory with a modsync server').version(PROTOCOL_VERSION);
  registerSyncCommands(program, deps);
  return program;
}
