export {
  applyGradingCommand,
  ControlRegistry,
  GRADING_COMMANDS,
  isGradingCommand,
  registerGradingCommands
} from './commands';
export type { CommandHandler, CommandOutcome, ControlCommand, GradingCommand, SessionCommand } from './commands';
export { DEFAULT_KEYMAP, parseKeySequence, toControlCommand } from './keymap';
export type { KeyInput } from './keymap';
export { sliderPositionToValue, sliderSpan, valueToSliderPosition } from './sliders';
