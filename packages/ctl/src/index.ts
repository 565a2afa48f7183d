#!/usr/bin/env node
import { Command } from 'commander';
import pc from 'picocolors';

import { algorithmLabel } from '@pressplay/models';

import {
  addFolderAction,
  createPpctlContext,
  describeSettings,
  parseNumberOption,
  removeFolderAction,
  setAlgorithmAction,
  setAutomationAction,
  setThresholdsAction,
  showSettingsAction,
  toggleExclusionAction
} from './actions';

const ctx = createPpctlContext();

const handleError = (error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(pc.red(`ppctl error: ${message}`));
  process.exitCode = 1;
};

const program = new Command();
program
  .name('ppctl')
  .description('PressPlay settings control CLI')
  .version('0.1.0');

const settings = program.command('settings').description('Settings helpers');

settings
  .command('show')
  .description('Print the current settings JSON')
  .action(async () => {
    try {
      const state = await showSettingsAction(ctx);
      if (state.error) {
        console.log(pc.yellow(state.error));
      }
      console.log(JSON.stringify(describeSettings(state.settings), null, 2));
    } catch (error) {
      handleError(error);
    }
  });

settings
  .command('automation')
  .argument('<state>', 'on or off')
  .description('Enable or disable automatic compression')
  .action(async (state: string) => {
    try {
      if (state !== 'on' && state !== 'off') {
        throw new Error(`Expected 'on' or 'off', got '${state}'`);
      }
      const updated = await setAutomationAction(state === 'on', ctx);
      console.log(pc.green(`Automatic compression ${updated.autoCompress ? 'enabled' : 'disabled'}.`));
    } catch (error) {
      handleError(error);
    }
  });

settings
  .command('thresholds')
  .description('Tune when automation may compress')
  .option('--cpu <percent>', 'CPU usage ceiling in percent (5-20)')
  .option('--idle <minutes>', 'Idle time before compressing (5-30)')
  .option('--cooldown <minutes>', 'Pause between automatic jobs (1-120)')
  .action(async (options: { cpu?: string; idle?: string; cooldown?: string }) => {
    try {
      const updated = await setThresholdsAction(
        {
          cpuPercent: parseNumberOption('--cpu', options.cpu),
          idleMinutes: parseNumberOption('--idle', options.idle),
          cooldownMinutes: parseNumberOption('--cooldown', options.cooldown)
        },
        ctx
      );
      console.log(pc.green('Thresholds updated.'));
      console.log(
        pc.dim(
          `cpu ${updated.cpuThreshold}% / idle ${updated.idleDurationMinutes} min / cooldown ${updated.cooldownMinutes} min`
        )
      );
    } catch (error) {
      handleError(error);
    }
  });

settings
  .command('algorithm')
  .argument('<name>', 'xpress4k, xpress8k, xpress16k or lzx')
  .action(async (name: string) => {
    try {
      const updated = await setAlgorithmAction(name, ctx);
      console.log(pc.green(`Default algorithm set to ${algorithmLabel(updated.algorithm)}.`));
    } catch (error) {
      handleError(error);
    }
  });

const folders = program.command('folders').description('Watched library folders');

folders
  .command('add')
  .argument('<path>', 'Folder to watch')
  .action(async (folder: string) => {
    try {
      const updated = await addFolderAction(folder, ctx);
      console.log(pc.green(`Watching ${updated.customFolders.length} folder(s).`));
    } catch (error) {
      handleError(error);
    }
  });

folders
  .command('remove')
  .argument('<path>', 'Folder to stop watching')
  .action(async (folder: string) => {
    try {
      const updated = await removeFolderAction(folder, ctx);
      console.log(pc.yellow(`Watching ${updated.customFolders.length} folder(s).`));
    } catch (error) {
      handleError(error);
    }
  });

const exclusions = program.command('exclusions').description('Games automation must skip');

exclusions
  .command('toggle')
  .argument('<path>', 'Game install path')
  .action(async (gamePath: string) => {
    try {
      const excluded = await toggleExclusionAction(gamePath, ctx);
      console.log(excluded ? pc.yellow(`${gamePath} excluded.`) : pc.green(`${gamePath} included.`));
    } catch (error) {
      handleError(error);
    }
  });

program.parseAsync(process.argv).catch(handleError);
