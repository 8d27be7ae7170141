import type { Logger } from "pino";
import { InputClosedError, InvalidChoiceError } from "@shared/errors";

import { formatErrorReport, toErrorReport } from "./errors";
import type { ShellIO } from "./io";
import { MENU_OPTIONS, type MenuAction, type MenuOption, type ShellContext } from "./menu";
import { canTransition, type ShellState } from "./state";

const EXIT_CHOICES = new Set(["0", "q", "quit", "exit"]);

export interface InteractiveShellOptions {
  io: ShellIO;
  context: ShellContext;
  logger: Logger;
  options?: readonly MenuOption[];
  onTransition?: (from: ShellState, to: ShellState) => void;
}

/**
 * Menu loop. Every failure raised while collecting input or running an option
 * is reported and the menu comes back; only an exit choice or end of input
 * leaves the loop.
 */
export class InteractiveShell {
  private state: ShellState = "MenuDisplayed";
  private readonly io: ShellIO;
  private readonly context: ShellContext;
  private readonly logger: Logger;
  private readonly options: ReadonlyMap<string, MenuOption>;
  private readonly onTransition?: (from: ShellState, to: ShellState) => void;

  constructor(options: InteractiveShellOptions) {
    this.io = options.io;
    this.context = options.context;
    this.logger = options.logger;
    this.options = new Map((options.options ?? MENU_OPTIONS).map((option) => [option.key, option]));
    this.onTransition = options.onTransition;
  }

  get currentState(): ShellState {
    return this.state;
  }

  async run(): Promise<void> {
    this.io.write("===== WORLD CLOCK - TIME ZONE TOOL =====");

    while (this.state !== "Exited") {
      if (this.state !== "MenuDisplayed") {
        this.transition("MenuDisplayed");
      }
      this.printMenu();

      const answer = await this.io.question(`Enter your choice (${this.choiceRange()}): `);
      const choice = answer?.trim().toLowerCase() ?? null;

      if (choice === null || EXIT_CHOICES.has(choice)) {
        this.transition("Exited");
        this.io.write("Goodbye!");
        this.logger.debug({ reason: choice === null ? "end of input" : "exit choice" }, "shell exited");
        return;
      }

      const option = this.options.get(choice);
      if (!option) {
        this.showError(new InvalidChoiceError(choice, `one of ${this.choiceRange()}`));
        continue;
      }

      await this.dispatch(option);
    }
  }

  private async dispatch(option: MenuOption): Promise<void> {
    let lines: string[];

    try {
      this.transition("AwaitingInput");
      const action: MenuAction = await option.prepare(this.ask, this.context);

      this.transition("Dispatching");
      this.logger.debug({ option: option.key, label: option.label }, "dispatching menu option");
      lines = action();
    } catch (error) {
      this.showError(error);
      return;
    }

    this.transition("ResultDisplayed");
    this.io.write("");
    for (const line of lines) {
      this.io.write(line);
    }
  }

  private readonly ask = async (question: string): Promise<string> => {
    const answer = await this.io.question(`${question}: `);
    if (answer === null) {
      throw new InputClosedError(question);
    }
    return answer.trim();
  };

  private showError(error: unknown): void {
    this.transition("ErrorDisplayed");

    const report = toErrorReport(error);
    if (report.expectedFailure) {
      this.logger.info({ code: report.code }, report.message);
    } else {
      this.logger.error({ err: error }, "menu option failed");
    }

    this.io.write("");
    this.io.write(formatErrorReport(report));
  }

  private transition(next: ShellState): void {
    if (!canTransition(this.state, next)) {
      throw new Error(`Illegal shell transition: ${this.state} -> ${next}`);
    }
    const previous = this.state;
    this.state = next;
    this.onTransition?.(previous, next);
  }

  private printMenu(): void {
    this.io.write("");
    this.io.write("Select an option:");
    for (const option of this.options.values()) {
      this.io.write(`${option.key}. ${option.label}`);
    }
    this.io.write("0. Exit");
  }

  private choiceRange(): string {
    const keys = [...this.options.keys()];
    return `0-${keys[keys.length - 1] ?? "0"}`;
  }
}
