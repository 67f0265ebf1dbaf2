import type { ParameterName, ParameterStore } from '@softisp/color-grading';

export type GradingCommand = 'increment' | 'decrement' | 'reset' | 'cycle';
export type SessionCommand = 'quit' | 'print' | 'save' | 'togglePause' | 'step';
export type ControlCommand = GradingCommand | SessionCommand;

export const GRADING_COMMANDS: readonly GradingCommand[] = ['increment', 'decrement', 'reset', 'cycle'];

const GRADING_COMMAND_SET: ReadonlySet<ControlCommand> = new Set(GRADING_COMMANDS);

export const isGradingCommand = (command: ControlCommand): command is GradingCommand =>
  GRADING_COMMAND_SET.has(command);

export interface CommandOutcome {
  command: GradingCommand;
  setting: ParameterName;
  value: number;
}

/**
 * Run one primitive command against the store and report what it touched
 */
export const applyGradingCommand = (store: ParameterStore, command: GradingCommand): CommandOutcome => {
  switch (command) {
    case 'increment':
    case 'decrement': {
      const value = store.adjustActive(command === 'increment' ? 1 : -1);
      return { command, setting: store.activeSetting, value };
    }
    case 'reset':
      store.reset();
      return { command, setting: store.activeSetting, value: store.get(store.activeSetting) };
    case 'cycle': {
      const setting = store.cycleActive();
      return { command, setting, value: store.get(setting) };
    }
  }
};

export type CommandHandler = (command: ControlCommand) => void;

export class ControlRegistry {
  private readonly handlers = new Map<ControlCommand, CommandHandler>();

  register(command: ControlCommand, handler: CommandHandler): void {
    this.handlers.set(command, handler);
  }

  has(command: ControlCommand): boolean {
    return this.handlers.has(command);
  }

  /**
   * Dispatch a command; returns false when nothing is registered for it
   */
  handle(command: ControlCommand | null): boolean {
    if (!command) {
      return false;
    }
    const handler = this.handlers.get(command);
    if (!handler) {
      return false;
    }
    handler(command);
    return true;
  }
}

export const registerGradingCommands = (
  registry: ControlRegistry,
  store: ParameterStore,
  onApplied?: (outcome: CommandOutcome) => void
): void => {
  GRADING_COMMANDS.forEach(command => {
    registry.register(command, () => {
      const outcome = applyGradingCommand(store, command);
      onApplied?.(outcome);
    });
  });
};
