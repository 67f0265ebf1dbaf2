#!/usr/bin/env tsx
import readline from 'node:readline';

import { Command } from 'commander';
import pc from 'picocolors';

import {
  applyKeysAction,
  createIspctlContext,
  createPreviewSession,
  exportSettingsAction,
  formatSettings,
  renderImageAction,
  resetSettingsAction,
  setParameterAction,
  showSettingsAction
} from './actions';

const ctx = createIspctlContext({
  info: (message: string) => console.log(pc.dim(message)),
  warn: (message: string) => console.warn(pc.yellow(message)),
  error: (message: string) => console.error(pc.red(message))
});

const handleError = (error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(pc.red(`ispctl error: ${message}`));
  process.exitCode = 1;
};

const collect = (value: string, previous: string[]): string[] => [...previous, value];

const program = new Command();
program
  .name('ispctl')
  .description('Software ISP grading for captured frames')
  .version('0.1.0');

program
  .command('render')
  .description('Grade an image file and write the result')
  .argument('<input>', 'Source image')
  .argument('<output>', 'Destination image (format from extension)')
  .option('-s, --settings <file>', 'Settings document to grade with')
  .option('--set <NAME=VALUE>', 'Override one parameter (repeatable)', collect, [])
  .option('--stored', 'Start from the stored settings', false)
  .action(async (input: string, output: string, options: { settings?: string; set: string[]; stored?: boolean }) => {
    try {
      const result = await renderImageAction(
        {
          input,
          output,
          settingsFile: options.settings,
          overrides: options.set,
          useStored: Boolean(options.stored)
        },
        ctx
      );
      console.log(pc.green(`Rendered ${result.width}x${result.height} frame to ${result.output}`));
    } catch (error) {
      handleError(error);
    }
  });

program
  .command('preview')
  .description('Adjust settings with the keyboard while re-rendering one image')
  .argument('<input>', 'Source image')
  .argument('<output>', 'Image rewritten after every change')
  .action(async (input: string, output: string) => {
    try {
      const session = await createPreviewSession({ input, output }, ctx);
      await session.refresh();
      console.log(pc.bold('+/- adjust, s next setting, r reset, p print, w save, q quit'));

      readline.emitKeypressEvents(process.stdin);
      if (process.stdin.isTTY) {
        process.stdin.setRawMode(true);
      }

      const stop = () => {
        if (process.stdin.isTTY) {
          process.stdin.setRawMode(false);
        }
        process.stdin.pause();
      };

      process.stdin.on('keypress', (_chunk: string | undefined, key: { name?: string; sequence?: string; ctrl?: boolean }) => {
        if (key.ctrl && key.name === 'c') {
          stop();
          return;
        }
        session
          .handleKey(key)
          .then(status => {
            if (status === 'quit') {
              stop();
            }
          })
          .catch((error: unknown) => {
            handleError(error);
            stop();
          });
      });
    } catch (error) {
      handleError(error);
    }
  });

const settings = program.command('settings').description('Stored grading settings');

settings
  .command('show')
  .description('Print the stored settings')
  .action(async () => {
    try {
      console.log(formatSettings(await showSettingsAction(ctx)));
    } catch (error) {
      handleError(error);
    }
  });

settings
  .command('json')
  .description('Print the stored settings as JSON')
  .action(async () => {
    try {
      const data = await showSettingsAction(ctx);
      console.log(JSON.stringify(data, null, 2));
    } catch (error) {
      handleError(error);
    }
  });

settings
  .command('set')
  .argument('<name>', 'Parameter name, e.g. CONTRAST')
  .argument('<value>', 'New value (clamped to the parameter range)')
  .action(async (name: string, value: string) => {
    try {
      const result = await setParameterAction(name, Number(value), ctx);
      console.log(pc.green(`${result.name} set to ${result.value}`));
    } catch (error) {
      handleError(error);
    }
  });

settings
  .command('reset')
  .description('Restore every parameter to its default')
  .action(async () => {
    try {
      await resetSettingsAction(ctx);
      console.log(pc.yellow('All grading settings reset.'));
    } catch (error) {
      handleError(error);
    }
  });

settings
  .command('keys')
  .argument('<sequence>', "Key presses to replay, e.g. 's++'")
  .action(async (sequence: string) => {
    try {
      const { settings: updated, outcomes } = await applyKeysAction(sequence, ctx);
      console.log(pc.green(`Applied ${outcomes.length} command(s).`));
      console.log(formatSettings(updated));
    } catch (error) {
      handleError(error);
    }
  });

settings
  .command('export')
  .argument('<file>', 'Destination JSON file')
  .action(async (file: string) => {
    try {
      const target = await exportSettingsAction(file, ctx);
      console.log(pc.green(`Settings written to ${target}`));
    } catch (error) {
      handleError(error);
    }
  });

program.parseAsync(process.argv).catch(handleError);
