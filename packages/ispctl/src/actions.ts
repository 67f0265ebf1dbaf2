import path from 'node:path';

import {
  assertParameterName,
  createDefaultParameterSet,
  formatParameterTable,
  ParameterStore,
  render,
  type Frame,
  type ParameterName,
  type ParameterSet
} from '@softisp/color-grading';
import {
  applyGradingCommand,
  isGradingCommand,
  parseKeySequence,
  toControlCommand,
  type CommandOutcome,
  type KeyInput
} from '@softisp/controls';
import {
  fromParameterStore,
  loadGradingSettings,
  readSettingsDocument,
  saveGradingSettings,
  toParameterStore,
  writeSettingsDocument,
  type GradingSettings
} from '@softisp/settings';

import { readFrame, writeFrame } from './frame-io';

export type IspctlLogger = Pick<Console, 'info' | 'warn' | 'error'>;

export interface IspctlContext {
  loadSettings: typeof loadGradingSettings;
  saveSettings: typeof saveGradingSettings;
  readSettingsDocument: typeof readSettingsDocument;
  writeSettingsDocument: typeof writeSettingsDocument;
  readFrame: (filePath: string) => Promise<Frame>;
  writeFrame: (frame: Frame, filePath: string) => Promise<string>;
  logger: IspctlLogger;
}

/* c8 ignore start */
export const createIspctlContext = (logger: IspctlLogger = console): IspctlContext => ({
  loadSettings: loadGradingSettings,
  saveSettings: saveGradingSettings,
  readSettingsDocument,
  writeSettingsDocument,
  readFrame,
  writeFrame,
  logger
});
/* c8 ignore end */

/**
 * Parse a NAME=VALUE override from the command line
 */
export const parseOverride = (raw: string): [ParameterName, number] => {
  const separator = raw.indexOf('=');
  if (separator <= 0) {
    throw new Error(`Override '${raw}' must look like NAME=VALUE`);
  }
  const name = assertParameterName(raw.slice(0, separator).trim().toUpperCase());
  const value = Number(raw.slice(separator + 1).trim());
  if (!Number.isFinite(value)) {
    throw new Error(`Override '${raw}' has a non-numeric value`);
  }
  return [name, value];
};

export interface RenderImageInput {
  input: string;
  output: string;
  settingsFile?: string;
  overrides?: string[];
  useStored?: boolean;
}

export interface RenderImageResult {
  output: string;
  width: number;
  height: number;
  parameters: Readonly<ParameterSet>;
}

const resolveParameters = async (input: RenderImageInput, ctx: IspctlContext): Promise<ParameterSet> => {
  let base: ParameterSet = createDefaultParameterSet();
  if (input.useStored) {
    base = (await ctx.loadSettings()).parameters;
  }
  if (input.settingsFile) {
    base = await ctx.readSettingsDocument(input.settingsFile);
  }
  const store = new ParameterStore({ initial: base });
  for (const raw of input.overrides ?? []) {
    const [name, value] = parseOverride(raw);
    store.set(name, value);
  }
  return { ...store.snapshot() };
};

export const renderImageAction = async (
  input: RenderImageInput,
  ctx = createIspctlContext()
): Promise<RenderImageResult> => {
  const parameters = await resolveParameters(input, ctx);
  const frame = await ctx.readFrame(input.input);
  const graded = render(frame, parameters);
  const output = await ctx.writeFrame(graded, input.output);
  return { output, width: graded.width, height: graded.height, parameters };
};

export const showSettingsAction = async (ctx = createIspctlContext()): Promise<GradingSettings> =>
  ctx.loadSettings();

export const formatSettings = (settings: GradingSettings): string =>
  formatParameterTable(settings.parameters, settings.activeSetting);

export interface SetParameterResult {
  settings: GradingSettings;
  name: ParameterName;
  value: number;
}

export const setParameterAction = async (
  name: string,
  value: number,
  ctx = createIspctlContext()
): Promise<SetParameterResult> => {
  const key = assertParameterName(name.toUpperCase());
  const current = await ctx.loadSettings();
  const store = toParameterStore(current);
  const stored = store.set(key, value);
  const settings = await ctx.saveSettings(fromParameterStore(store, current));
  return { settings, name: key, value: stored };
};

export const resetSettingsAction = async (ctx = createIspctlContext()): Promise<GradingSettings> => {
  const current = await ctx.loadSettings();
  const store = toParameterStore(current, ctx.logger);
  store.reset();
  return ctx.saveSettings(fromParameterStore(store, current));
};

export interface ApplyKeysResult {
  settings: GradingSettings;
  outcomes: CommandOutcome[];
}

/**
 * Replay a key sequence (e.g. "s++") against the stored settings.
 * Session keys such as 'q' or 'p' are ignored.
 */
export const applyKeysAction = async (sequence: string, ctx = createIspctlContext()): Promise<ApplyKeysResult> => {
  const current = await ctx.loadSettings();
  const store = toParameterStore(current, ctx.logger);
  const outcomes = parseKeySequence(sequence)
    .filter(isGradingCommand)
    .map(command => applyGradingCommand(store, command));
  const settings = await ctx.saveSettings(fromParameterStore(store, current));
  return { settings, outcomes };
};

export const exportSettingsAction = async (filePath: string, ctx = createIspctlContext()): Promise<string> => {
  const current = await ctx.loadSettings();
  return ctx.writeSettingsDocument(filePath, current.parameters);
};

export type PreviewStatus = 'continue' | 'quit';

export interface PreviewSession {
  /** Render the current parameters to the output file */
  refresh: () => Promise<string>;
  handleKey: (key: KeyInput) => Promise<PreviewStatus>;
}

/** Export document written beside the preview image, e.g. out/frame.png -> out/frame.settings.json */
export const previewDocumentPath = (output: string): string => {
  const { dir, name } = path.parse(output);
  return path.join(dir, `${name}.settings.json`);
};

/**
 * Key-driven preview of a single frame.
 * Every grading command re-renders the output file. Keys and refreshes run
 * one at a time in arrival order, so the file always holds the latest render.
 */
export const createPreviewSession = async (
  input: { input: string; output: string },
  ctx = createIspctlContext()
): Promise<PreviewSession> => {
  const frame = await ctx.readFrame(input.input);
  let settings = await ctx.loadSettings();
  const store = toParameterStore(settings, ctx.logger);

  let pending: Promise<unknown> = Promise.resolve();
  const enqueue = <T>(task: () => Promise<T>): Promise<T> => {
    const run = pending.then(task);
    // failures reach the caller through `run`; the queue itself keeps going
    pending = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  };

  const writePreview = () => ctx.writeFrame(render(frame, store.snapshot()), input.output);

  const processKey = async (key: KeyInput): Promise<PreviewStatus> => {
    const command = toControlCommand(key);
    if (!command) {
      return 'continue';
    }
    if (isGradingCommand(command)) {
      applyGradingCommand(store, command);
      await writePreview();
      return 'continue';
    }
    switch (command) {
      case 'quit':
        return 'quit';
      case 'print':
        ctx.logger.info(formatParameterTable(store.snapshot(), store.activeSetting));
        return 'continue';
      case 'save': {
        settings = await ctx.saveSettings(fromParameterStore(store, settings));
        const documentPath = await ctx.writeSettingsDocument(previewDocumentPath(input.output), store.snapshot());
        ctx.logger.info(`[Preview] Saved settings (${store.activeSetting} active) and ${documentPath}`);
        return 'continue';
      }
      case 'togglePause':
      case 'step':
        ctx.logger.warn(`[Preview] '${command}' has no effect on a still image`);
        return 'continue';
    }
  };

  return {
    refresh: () => enqueue(writePreview),
    handleKey: key => enqueue(() => processKey(key))
  };
};
