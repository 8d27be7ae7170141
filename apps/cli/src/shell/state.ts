export type ShellState =
  | "MenuDisplayed"
  | "AwaitingInput"
  | "Dispatching"
  | "ResultDisplayed"
  | "ErrorDisplayed"
  | "Exited";

export const SHELL_TRANSITIONS: Readonly<Record<ShellState, readonly ShellState[]>> = {
  MenuDisplayed: ["AwaitingInput", "ErrorDisplayed", "Exited"],
  AwaitingInput: ["Dispatching", "ErrorDisplayed"],
  Dispatching: ["ResultDisplayed", "ErrorDisplayed"],
  ResultDisplayed: ["MenuDisplayed"],
  ErrorDisplayed: ["MenuDisplayed"],
  Exited: [],
};

export function canTransition(from: ShellState, to: ShellState): boolean {
  return SHELL_TRANSITIONS[from].includes(to);
}
